/**
 * Board package - a task board stored as markdown files.
 *
 *   board.md                          title, columns, labels, card template
 *   cards/{column}/{slug}.md          one file per card
 *   archive/{yyyy-MM-dd}-{slug}.md    archived cards
 *
 * MCP tools: board_list, board_get, board_add, board_update, board_move,
 * board_duplicate, board_delete, board_archive, board_archived, board_restore,
 * sync_status, sync_run, sync_push.
 */

export type {
  Board,
  Card,
  Column,
  Label,
  LoadedBoard,
  CodecError,
  BoardLoaderError,
  CardWriterError,
} from "./core/model.js";
export {
  ARCHIVE_COLUMN,
  createEmptyBoard,
  describeCodecError,
  describeLoaderError,
  describeWriterError,
} from "./core/model.js";

export type { BoardConfig, BoardLayout, BoardConfigOverrides } from "./core/config.js";
export { DEFAULT_BOARD_CONFIG, BoardLayoutSchema, resolveBoardConfig } from "./core/config.js";
export type { BoardCodec } from "./core/ports/BoardCodec.js";
export { MarkdownCodec, formatDate } from "./infrastructure/codec/MarkdownCodec.js";
export { slugify } from "./core/slugify.js";
export { first, after, before, between } from "./core/position.js";

export { loadBoard, loadArchivedCards, comparePositions } from "./core/BoardLoader.js";
export type { SaveCardOptions } from "./core/CardWriter.js";
export { saveCard, deleteCard, archiveCard, unarchiveCard } from "./core/CardWriter.js";
export { saveBoard, createBoard } from "./core/BoardWriter.js";
export { readBoardTitle } from "./core/BoardTitleReader.js";

export type {
  BoardWatcher,
  CardsChangedCallback,
  BoardChangedCallback,
} from "./core/ports/FileWatcher.js";
export { NodeBoardWatcher } from "./infrastructure/watcher/NodeBoardWatcher.js";

export type {
  BoardServiceError,
  CardFilter,
  CreateCardOptions,
  UpdateCardOptions,
  CardChangeSummary,
  UpdateLabelOptions,
} from "./core/BoardService.js";
export { BoardService, cardSlug, describeBoardServiceError } from "./core/BoardService.js";

export type { ServerSettings, SyncMode } from "./settings.js";
export { readServerSettings } from "./settings.js";
export { runSyncCycle, startPeriodicSync } from "./syncLoop.js";
export type { ToolServices, CardView } from "./tools/types.js";
export { registerBoardTools } from "./tools/registerTools.js";
