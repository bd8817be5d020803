/**
 * Board loading - materializes a board directory into memory.
 *
 *   {dir}/board.md
 *   {dir}/cards/{column}/{slug}.md
 *   {dir}/archive/{yyyy-MM-dd}-{slug}.md
 */

import { existsSync, mkdirSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import { Err, Ok, tryCatch, type Result } from "@plainboard/core";
import { DEFAULT_BOARD_CONFIG, type BoardConfig } from "./config.js";
import { errorMessage, listFiles } from "./fileUtils.js";
import {
  ARCHIVE_COLUMN,
  describeCodecError,
  type Board,
  type BoardLoaderError,
  type Card,
  type LoadedBoard,
} from "./model.js";
import { archiveDirPath, boardFilePath, columnDirPath, fileStem } from "./paths.js";

/** Ordinal comparison of position tokens. */
export function comparePositions(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortByPosition(cards: Card[]): Card[] {
  return [...cards].sort((a, b) => comparePositions(a.position, b.position));
}

/**
 * Column ids become directory names, so they must be unique single path segments.
 */
export function validateColumns(board: Board): string | null {
  const seen = new Set<string>();
  for (const column of board.columns) {
    if (column.id === "" || column.id === "." || column.id === ".." || /[\\/]/.test(column.id)) {
      return `column id "${column.id}" is not a valid directory name`;
    }
    if (seen.has(column.id)) {
      return `duplicate column id "${column.id}"`;
    }
    seen.add(column.id);
  }
  return null;
}

/**
 * Read and parse one card file, filling in `sourceSlug` from the filename.
 */
export function readCardFile(filePath: string, config: BoardConfig): Result<Card, string> {
  const text = tryCatch(() => readFileSync(filePath, "utf-8"));
  if (!text.ok) return Err(text.error.message);

  const parsed = config.codec.parseCard(text.value);
  if (!parsed.ok) return Err(describeCodecError(parsed.error));

  return Ok({ ...parsed.value, sourceSlug: fileStem(filePath, config) });
}

/**
 * Load the board file and every card under the declared columns.
 * Missing column directories are created; unreadable card files are skipped.
 */
export function loadBoard(
  directory: string,
  config: BoardConfig = DEFAULT_BOARD_CONFIG
): Result<LoadedBoard, BoardLoaderError> {
  if (!existsSync(directory) || !statSync(directory).isDirectory()) {
    return Err<BoardLoaderError>({ kind: "directoryNotFound", directory });
  }

  const boardPath = boardFilePath(directory, config);
  if (!existsSync(boardPath)) {
    return Err<BoardLoaderError>({ kind: "boardFileNotFound", path: boardPath });
  }

  const text = tryCatch(() => readFileSync(boardPath, "utf-8"));
  if (!text.ok) {
    return Err<BoardLoaderError>({ kind: "invalidBoardFile", reason: text.error.message });
  }

  const parsed = config.codec.parseBoard(text.value);
  if (!parsed.ok) {
    return Err<BoardLoaderError>({ kind: "invalidBoardFile", reason: describeCodecError(parsed.error) });
  }
  const board = parsed.value;

  const invalid = validateColumns(board);
  if (invalid) {
    return Err<BoardLoaderError>({ kind: "invalidBoardFile", reason: invalid });
  }

  const cards: Card[] = [];
  for (const column of board.columns) {
    const columnDir = columnDirPath(directory, column.id, config);
    try {
      mkdirSync(columnDir, { recursive: true });
    } catch (error) {
      console.error(`[board] Warning: could not create column directory ${column.id}: ${errorMessage(error)}`);
      continue;
    }

    for (const name of listFiles(columnDir, config.extension)) {
      const card = readCardFile(join(columnDir, name), config);
      if (card.ok) {
        cards.push(card.value);
      } else {
        console.error(`[board] Warning: skipping malformed card file ${column.id}/${name}: ${card.error}`);
      }
    }
  }

  return Ok({ board, cards: sortByPosition(cards), directory });
}

/**
 * Load archived cards, newest first (filenames carry a date prefix).
 * Each card's column is replaced by the archive marker; `sourceSlug` keeps
 * the full archived stem.
 */
export function loadArchivedCards(
  directory: string,
  config: BoardConfig = DEFAULT_BOARD_CONFIG
): Result<Card[], BoardLoaderError> {
  const archiveDir = archiveDirPath(directory, config);
  if (!existsSync(archiveDir)) {
    return Ok([]);
  }

  const files = tryCatch(() => listFiles(archiveDir, config.extension).reverse());
  if (!files.ok) {
    return Err<BoardLoaderError>({ kind: "directoryNotFound", directory: archiveDir });
  }

  const cards: Card[] = [];
  for (const name of files.value) {
    const card = readCardFile(join(archiveDir, name), config);
    if (card.ok) {
      cards.push({ ...card.value, column: ARCHIVE_COLUMN });
    } else {
      console.error(`[board] Warning: skipping malformed archive file ${name}: ${card.error}`);
    }
  }
  return Ok(cards);
}
