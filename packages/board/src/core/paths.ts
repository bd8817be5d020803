import { basename, join } from "node:path";
import type { BoardConfig } from "./config.js";

export function boardFilePath(directory: string, config: BoardConfig): string {
  return join(directory, config.boardFileName);
}

export function cardsDirPath(directory: string, config: BoardConfig): string {
  return join(directory, config.cardsDirName);
}

export function columnDirPath(directory: string, column: string, config: BoardConfig): string {
  return join(directory, config.cardsDirName, column);
}

export function cardFilePath(directory: string, column: string, slug: string, config: BoardConfig): string {
  return join(columnDirPath(directory, column, config), `${slug}${config.extension}`);
}

export function archiveDirPath(directory: string, config: BoardConfig): string {
  return join(directory, config.archiveDirName);
}

/** Filename without directory and extension. */
export function fileStem(filePath: string, config: BoardConfig): string {
  return basename(filePath, config.extension);
}
