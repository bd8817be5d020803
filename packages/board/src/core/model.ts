/**
 * Board model types.
 * Plain data; nothing here touches the file system.
 */

/**
 * Column marker given to cards loaded from the archive.
 */
export const ARCHIVE_COLUMN = "archive";

/**
 * A column on the board. The id doubles as the directory name under cards/.
 */
export interface Column {
  id: string;
  name: string;
}

export interface Label {
  id: string;
  name: string;
  /** CSS color, e.g. "#e74c3c" */
  color: string;
}

/**
 * Board metadata stored in board.md.
 */
export interface Board {
  title: string;
  columns: Column[];
  labels: Label[];
  /** Body given to new cards created without one. */
  cardTemplate: string;
}

/**
 * A card stored as cards/{column}/{slug}.md.
 */
export interface Card {
  /** Unique across the whole board. */
  title: string;
  column: string;
  /** Lexicographic ordering token. */
  position: string;
  created: Date;
  modified: Date;
  labels: string[];
  /** Markdown body. */
  body: string;
  /**
   * Filename stem the card was loaded from or last written under.
   * Never written into the file itself.
   */
  sourceSlug?: string;
}

/**
 * Snapshot of a board directory at load time.
 */
export interface LoadedBoard {
  board: Board;
  cards: Card[];
  directory: string;
}

export type CodecError =
  | { kind: "missingFrontmatter" }
  | { kind: "invalidFrontmatter"; reason: string }
  | { kind: "missingRequiredField"; field: string };

export type BoardLoaderError =
  | { kind: "directoryNotFound"; directory: string }
  | { kind: "boardFileNotFound"; path: string }
  | { kind: "invalidBoardFile"; reason: string };

export type CardWriterError =
  | { kind: "duplicateTitle"; title: string }
  | { kind: "fileOperationFailed"; reason: string };

export function describeCodecError(error: CodecError): string {
  switch (error.kind) {
    case "missingFrontmatter":
      return "missing frontmatter";
    case "invalidFrontmatter":
      return `invalid frontmatter: ${error.reason}`;
    case "missingRequiredField":
      return `missing required field: ${error.field}`;
  }
}

export function describeLoaderError(error: BoardLoaderError): string {
  switch (error.kind) {
    case "directoryNotFound":
      return `Board directory not found: ${error.directory}`;
    case "boardFileNotFound":
      return `Board file not found: ${error.path}`;
    case "invalidBoardFile":
      return `Invalid board file: ${error.reason}`;
  }
}

export function describeWriterError(error: CardWriterError): string {
  switch (error.kind) {
    case "duplicateTitle":
      return `A card titled "${error.title}" already exists`;
    case "fileOperationFailed":
      return `File operation failed: ${error.reason}`;
  }
}

export function createEmptyBoard(title: string): Board {
  return {
    title,
    columns: [
      { id: "todo", name: "To Do" },
      { id: "in-progress", name: "In Progress" },
      { id: "done", name: "Done" },
    ],
    labels: [],
    cardTemplate: "",
  };
}
