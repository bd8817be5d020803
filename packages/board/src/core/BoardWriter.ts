/**
 * Board file persistence and board creation.
 */

import { existsSync, mkdirSync } from "node:fs";
import { Err, Ok, type Result } from "@plainboard/core";
import { DEFAULT_BOARD_CONFIG, type BoardConfig } from "./config.js";
import { errorMessage, writeFileAtomic } from "./fileUtils.js";
import type { Board, CardWriterError } from "./model.js";
import { archiveDirPath, boardFilePath, columnDirPath } from "./paths.js";

/**
 * Write board.md atomically.
 */
export function saveBoard(
  board: Board,
  directory: string,
  config: BoardConfig = DEFAULT_BOARD_CONFIG
): Result<void, CardWriterError> {
  try {
    writeFileAtomic(boardFilePath(directory, config), config.codec.serializeBoard(board));
    return Ok(undefined);
  } catch (error) {
    return Err<CardWriterError>({ kind: "fileOperationFailed", reason: errorMessage(error) });
  }
}

/**
 * Create a board directory with its archive and column directories, then
 * write board.md. An existing board is never overwritten.
 */
export function createBoard(
  board: Board,
  directory: string,
  config: BoardConfig = DEFAULT_BOARD_CONFIG
): Result<void, CardWriterError> {
  const boardPath = boardFilePath(directory, config);
  if (existsSync(boardPath)) {
    return Err<CardWriterError>({ kind: "fileOperationFailed", reason: `Board already exists at ${boardPath}` });
  }

  try {
    mkdirSync(directory, { recursive: true });
    mkdirSync(archiveDirPath(directory, config), { recursive: true });
    for (const column of board.columns) {
      mkdirSync(columnDirPath(directory, column.id, config), { recursive: true });
    }
  } catch (error) {
    return Err<CardWriterError>({ kind: "fileOperationFailed", reason: errorMessage(error) });
  }

  return saveBoard(board, directory, config);
}
