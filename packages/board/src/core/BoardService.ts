/**
 * Board service - keeps a loaded board in memory and persists every change
 * through the loader and writers.
 *
 * Cards are addressed by slug: the filename stem they live under.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { Err, Ok, type Result } from "@plainboard/core";
import { loadArchivedCards, loadBoard, readCardFile, sortByPosition, validateColumns } from "./BoardLoader.js";
import { createBoard, saveBoard } from "./BoardWriter.js";
import { archiveCard, deleteCard, saveCard, unarchiveCard } from "./CardWriter.js";
import { DEFAULT_BOARD_CONFIG, type BoardConfig } from "./config.js";
import {
  ARCHIVE_COLUMN,
  createEmptyBoard,
  describeLoaderError,
  describeWriterError,
  type Board,
  type BoardLoaderError,
  type Card,
  type CardWriterError,
  type Column,
  type Label,
} from "./model.js";
import { archiveDirPath, cardFilePath } from "./paths.js";
import { after, before, between, first } from "./position.js";
import type { BoardWatcher } from "./ports/FileWatcher.js";
import { slugify } from "./slugify.js";

export type BoardServiceError =
  | BoardLoaderError
  | CardWriterError
  | { kind: "cardNotFound"; slug: string }
  | { kind: "columnNotFound"; id: string }
  | { kind: "columnExists"; id: string }
  | { kind: "columnNotEmpty"; id: string }
  | { kind: "lastColumn" }
  | { kind: "labelNotFound"; id: string }
  | { kind: "labelExists"; id: string }
  | { kind: "invalidOrder"; reason: string };

export function describeBoardServiceError(error: BoardServiceError): string {
  switch (error.kind) {
    case "cardNotFound":
      return `Card not found: ${error.slug}`;
    case "columnNotFound":
      return `Column not found: ${error.id}`;
    case "columnExists":
      return `Column already exists: ${error.id}`;
    case "columnNotEmpty":
      return `Column is not empty: ${error.id}`;
    case "lastColumn":
      return "Cannot remove the last column";
    case "labelNotFound":
      return `Label not found: ${error.id}`;
    case "labelExists":
      return `Label already exists: ${error.id}`;
    case "invalidOrder":
      return `Invalid order: ${error.reason}`;
    case "duplicateTitle":
    case "fileOperationFailed":
      return describeWriterError(error);
    case "directoryNotFound":
    case "boardFileNotFound":
    case "invalidBoardFile":
      return describeLoaderError(error);
  }
}

export interface CardFilter {
  column?: string;
  /** Every label listed must be present. */
  labels?: string[];
  /** Case-insensitive match in title or body. */
  search?: string;
}

export interface CreateCardOptions {
  title: string;
  column: string;
  body?: string;
  labels?: string[];
}

export interface UpdateCardOptions {
  title?: string;
  body?: string;
  labels?: string[];
}

export interface UpdateLabelOptions {
  name?: string;
  color?: string;
}

export interface CardChangeSummary {
  updated: number;
  removed: number;
}

/** Slug a card is addressed by. */
export function cardSlug(card: Card): string {
  return card.sourceSlug ?? slugify(card.title);
}

export class BoardService {
  private board: Board;
  private cards: Card[];

  private constructor(
    readonly directory: string,
    private readonly config: BoardConfig,
    board: Board,
    cards: Card[]
  ) {
    this.board = board;
    this.cards = cards;
  }

  /**
   * Load an existing board directory.
   */
  static open(
    directory: string,
    config: BoardConfig = DEFAULT_BOARD_CONFIG
  ): Result<BoardService, BoardLoaderError> {
    const loaded = loadBoard(directory, config);
    if (!loaded.ok) return loaded;
    return Ok(new BoardService(directory, config, loaded.value.board, loaded.value.cards));
  }

  /**
   * Create a board with the default columns, then open it.
   */
  static create(
    directory: string,
    title: string,
    config: BoardConfig = DEFAULT_BOARD_CONFIG
  ): Result<BoardService, BoardServiceError> {
    const created = createBoard(createEmptyBoard(title), directory, config);
    if (!created.ok) return created;
    return BoardService.open(directory, config);
  }

  getBoard(): Board {
    return structuredClone(this.board);
  }

  getColumns(): Column[] {
    return this.board.columns.map((column) => ({ ...column }));
  }

  /**
   * Cards in position order, optionally filtered.
   */
  getCards(filter: CardFilter = {}): Card[] {
    const search = filter.search?.toLowerCase();
    const labels = filter.labels ?? [];

    return this.cards
      .filter((card) => filter.column === undefined || card.column === filter.column)
      .filter((card) => labels.every((label) => card.labels.includes(label)))
      .filter(
        (card) =>
          search === undefined ||
          card.title.toLowerCase().includes(search) ||
          card.body.toLowerCase().includes(search)
      )
      .map((card) => ({ ...card }));
  }

  getCard(slug: string): Result<Card, BoardServiceError> {
    const card = this.findCard(slug);
    if (!card) return Err<BoardServiceError>({ kind: "cardNotFound", slug });
    return Ok({ ...card });
  }

  getArchivedCards(): Result<Card[], BoardLoaderError> {
    return loadArchivedCards(this.directory, this.config);
  }

  /**
   * Create a card at the end of its column.
   */
  addCard(options: CreateCardOptions): Result<Card, BoardServiceError> {
    const title = options.title.trim();
    if (title === "") {
      return Err<BoardServiceError>({ kind: "fileOperationFailed", reason: "Card title cannot be empty" });
    }
    if (!this.hasColumn(options.column)) {
      return Err<BoardServiceError>({ kind: "columnNotFound", id: options.column });
    }
    if (this.titleTaken(title) || this.slugTaken(slugify(title))) {
      return Err<BoardServiceError>({ kind: "duplicateTitle", title });
    }

    const inColumn = this.cardsInColumn(options.column);
    const last = inColumn[inColumn.length - 1];
    const now = this.config.now();
    const card: Card = {
      title,
      column: options.column,
      position: last ? after(last.position) : first(),
      created: now,
      modified: now,
      labels: options.labels ?? [],
      body: options.body !== undefined && options.body !== "" ? options.body : this.board.cardTemplate,
    };

    const saved = saveCard(card, this.directory, { isNew: true }, this.config);
    if (!saved.ok) return saved;

    this.insert(saved.value);
    return Ok({ ...saved.value });
  }

  /**
   * Edit a card's title, body or labels. A new title renames the file.
   */
  updateCard(slug: string, options: UpdateCardOptions): Result<Card, BoardServiceError> {
    const card = this.findCard(slug);
    if (!card) return Err<BoardServiceError>({ kind: "cardNotFound", slug });

    const title = options.title?.trim() ?? card.title;
    if (title === "") {
      return Err<BoardServiceError>({ kind: "fileOperationFailed", reason: "Card title cannot be empty" });
    }
    if (title !== card.title && (this.titleTaken(title, card) || this.slugTaken(slugify(title), card))) {
      return Err<BoardServiceError>({ kind: "duplicateTitle", title });
    }

    const updated: Card = {
      ...card,
      title,
      body: options.body ?? card.body,
      labels: options.labels ?? card.labels,
      modified: this.config.now(),
    };

    const saved = saveCard(updated, this.directory, { previousTitle: card.title }, this.config);
    if (!saved.ok) return saved;

    this.replace(card, saved.value);
    return Ok({ ...saved.value });
  }

  /**
   * Move a card to `column`, at `index` among that column's other cards
   * (the end when omitted).
   */
  moveCard(slug: string, column: string, index?: number): Result<Card, BoardServiceError> {
    const card = this.findCard(slug);
    if (!card) return Err<BoardServiceError>({ kind: "cardNotFound", slug });
    if (!this.hasColumn(column)) {
      return Err<BoardServiceError>({ kind: "columnNotFound", id: column });
    }

    const others = this.cardsInColumn(column).filter((other) => other !== card);
    const at = Math.min(Math.max(index ?? others.length, 0), others.length);
    const previous = at > 0 ? others[at - 1] : undefined;
    const next = at < others.length ? others[at] : undefined;

    const moved: Card = {
      ...card,
      column,
      position: positionBetween(previous, next),
      modified: this.config.now(),
    };

    const saved = saveCard(moved, this.directory, { previousColumn: card.column }, this.config);
    if (!saved.ok) return saved;

    this.replace(card, saved.value);
    return Ok({ ...saved.value });
  }

  /**
   * Copy a card right after the original as "Title (Copy)", "Title (Copy 2)", ...
   */
  duplicateCard(slug: string): Result<Card, BoardServiceError> {
    const card = this.findCard(slug);
    if (!card) return Err<BoardServiceError>({ kind: "cardNotFound", slug });

    let title = `${card.title} (Copy)`;
    for (let counter = 2; this.titleTaken(title) || this.slugTaken(slugify(title)); counter++) {
      title = `${card.title} (Copy ${counter})`;
    }

    const column = this.cardsInColumn(card.column);
    const next = column[column.indexOf(card) + 1];
    const now = this.config.now();
    const copy: Card = {
      title,
      column: card.column,
      position: positionBetween(card, next),
      created: now,
      modified: now,
      labels: [...card.labels],
      body: card.body,
    };

    const saved = saveCard(copy, this.directory, { isNew: true }, this.config);
    if (!saved.ok) return saved;

    this.insert(saved.value);
    return Ok({ ...saved.value });
  }

  deleteCard(slug: string): Result<void, BoardServiceError> {
    const card = this.findCard(slug);
    if (!card) return Err<BoardServiceError>({ kind: "cardNotFound", slug });

    const deleted = deleteCard(card, this.directory, this.config);
    if (!deleted.ok) return deleted;

    this.cards = this.cards.filter((other) => other !== card);
    return Ok(undefined);
  }

  /**
   * Move a card to the archive. Returns the archive path.
   */
  archiveCard(slug: string): Result<string, BoardServiceError> {
    const card = this.findCard(slug);
    if (!card) return Err<BoardServiceError>({ kind: "cardNotFound", slug });

    const archived = archiveCard(card, this.directory, this.config);
    if (!archived.ok) return archived;

    this.cards = this.cards.filter((other) => other !== card);
    return archived;
  }

  /**
   * Bring an archived card back onto the board.
   * `card` is usually one returned by getArchivedCards().
   */
  restoreCard(archivePath: string, card: Card): Result<Card, BoardServiceError> {
    let column = card.column;
    if (column === ARCHIVE_COLUMN || column === "") {
      const archived = readCardFile(archivePath, this.config);
      if (!archived.ok) {
        return Err<BoardServiceError>({ kind: "fileOperationFailed", reason: archived.error });
      }
      column = archived.value.column;
    }
    if (!this.hasColumn(column)) {
      return Err<BoardServiceError>({ kind: "columnNotFound", id: column });
    }
    if (this.titleTaken(card.title) || this.slugTaken(slugify(card.title))) {
      return Err<BoardServiceError>({ kind: "duplicateTitle", title: card.title });
    }

    const restored = unarchiveCard(archivePath, { ...card, column }, this.directory, this.config);
    if (!restored.ok) return restored;

    this.insert(restored.value);
    return Ok({ ...restored.value });
  }

  /**
   * Archive several cards. Every slug is checked before anything moves.
   * Returns the archive paths in the order given.
   */
  archiveCards(slugs: string[]): Result<string[], BoardServiceError> {
    const missing = this.firstMissing(slugs);
    if (missing !== undefined) return Err<BoardServiceError>({ kind: "cardNotFound", slug: missing });

    const paths: string[] = [];
    for (const slug of new Set(slugs)) {
      const archived = this.archiveCard(slug);
      if (!archived.ok) return archived;
      paths.push(archived.value);
    }
    return Ok(paths);
  }

  /**
   * Delete several cards. Every slug is checked before anything is deleted.
   */
  deleteCards(slugs: string[]): Result<number, BoardServiceError> {
    const missing = this.firstMissing(slugs);
    if (missing !== undefined) return Err<BoardServiceError>({ kind: "cardNotFound", slug: missing });

    const unique = new Set(slugs);
    for (const slug of unique) {
      const deleted = this.deleteCard(slug);
      if (!deleted.ok) return deleted;
    }
    return Ok(unique.size);
  }

  /**
   * Move several cards to the end of `column`, keeping their relative order.
   * Cards already there stay put. Returns how many moved.
   */
  moveCards(slugs: string[], column: string): Result<number, BoardServiceError> {
    const missing = this.firstMissing(slugs);
    if (missing !== undefined) return Err<BoardServiceError>({ kind: "cardNotFound", slug: missing });
    if (!this.hasColumn(column)) {
      return Err<BoardServiceError>({ kind: "columnNotFound", id: column });
    }

    const wanted = new Set(slugs);
    const moving = this.cards.filter((card) => wanted.has(cardSlug(card)) && card.column !== column);
    for (const card of moving) {
      const moved = this.moveCard(cardSlug(card), column);
      if (!moved.ok) return moved;
    }
    return Ok(moving.length);
  }

  /**
   * Restore an archived card stored under `archivedSlug` (the archive
   * filename stem, date prefix included).
   */
  restoreArchivedCard(archivedSlug: string): Result<Card, BoardServiceError> {
    const archived = this.getArchivedCards();
    if (!archived.ok) return archived;

    const card = archived.value.find((candidate) => candidate.sourceSlug === archivedSlug);
    if (!card) return Err<BoardServiceError>({ kind: "cardNotFound", slug: archivedSlug });

    return this.restoreCard(this.archivePath(archivedSlug), card);
  }

  /** Where an archived card with this stem lives. */
  archivePath(archivedSlug: string): string {
    return join(archiveDirPath(this.directory, this.config), `${archivedSlug}${this.config.extension}`);
  }

  updateBoardTitle(title: string): Result<Board, BoardServiceError> {
    return this.saveBoardWith({ ...this.board, title });
  }

  updateCardTemplate(cardTemplate: string): Result<Board, BoardServiceError> {
    return this.saveBoardWith({ ...this.board, cardTemplate: cardTemplate.trim() });
  }

  /**
   * Append a column. The id defaults to the slug of its name.
   */
  addColumn(name: string, id: string = slugify(name)): Result<Board, BoardServiceError> {
    if (this.hasColumn(id)) {
      return Err<BoardServiceError>({ kind: "columnExists", id });
    }
    return this.saveBoardWith({ ...this.board, columns: [...this.board.columns, { id, name }] });
  }

  renameColumn(id: string, name: string): Result<Board, BoardServiceError> {
    if (!this.hasColumn(id)) {
      return Err<BoardServiceError>({ kind: "columnNotFound", id });
    }
    const columns = this.board.columns.map((column) => (column.id === id ? { id, name } : column));
    return this.saveBoardWith({ ...this.board, columns });
  }

  /**
   * Remove an empty column. The last column stays.
   */
  removeColumn(id: string): Result<Board, BoardServiceError> {
    if (!this.hasColumn(id)) {
      return Err<BoardServiceError>({ kind: "columnNotFound", id });
    }
    if (this.board.columns.length === 1) {
      return Err<BoardServiceError>({ kind: "lastColumn" });
    }
    if (this.cardsInColumn(id).length > 0) {
      return Err<BoardServiceError>({ kind: "columnNotEmpty", id });
    }
    const columns = this.board.columns.filter((column) => column.id !== id);
    return this.saveBoardWith({ ...this.board, columns });
  }

  /**
   * Put the columns in the given order. Every column id must appear once.
   */
  reorderColumns(ids: string[]): Result<Board, BoardServiceError> {
    const columns = reorder(this.board.columns, ids, "column");
    if (!columns.ok) return columns;
    return this.saveBoardWith({ ...this.board, columns: columns.value });
  }

  /**
   * Add a label to the board. The id defaults to the slug of its name.
   */
  addLabel(name: string, color: string, id: string = slugify(name)): Result<Board, BoardServiceError> {
    if (this.findLabel(id)) {
      return Err<BoardServiceError>({ kind: "labelExists", id });
    }
    return this.saveBoardWith({ ...this.board, labels: [...this.board.labels, { id, name, color }] });
  }

  updateLabel(id: string, options: UpdateLabelOptions): Result<Board, BoardServiceError> {
    const label = this.findLabel(id);
    if (!label) return Err<BoardServiceError>({ kind: "labelNotFound", id });

    const updated: Label = { id, name: options.name ?? label.name, color: options.color ?? label.color };
    const labels = this.board.labels.map((other) => (other.id === id ? updated : other));
    return this.saveBoardWith({ ...this.board, labels });
  }

  /**
   * Remove a label definition. Cards that carry the label keep it.
   */
  removeLabel(id: string): Result<Board, BoardServiceError> {
    if (!this.findLabel(id)) {
      return Err<BoardServiceError>({ kind: "labelNotFound", id });
    }
    const labels = this.board.labels.filter((label) => label.id !== id);
    return this.saveBoardWith({ ...this.board, labels });
  }

  /**
   * Put the labels in the given order. Every label id must appear once.
   */
  reorderLabels(ids: string[]): Result<Board, BoardServiceError> {
    const labels = reorder(this.board.labels, ids, "label");
    if (!labels.ok) return labels;
    return this.saveBoardWith({ ...this.board, labels: labels.value });
  }

  /**
   * Re-read cards reported by a watcher. Changed files are read first; a
   * deleted slug only drops a card whose file is really gone and that was not
   * just re-read.
   */
  applyCardChanges(changedPaths: string[], deletedSlugs: string[]): CardChangeSummary {
    const summary: CardChangeSummary = { updated: 0, removed: 0 };
    const touched = new Set<string>();

    for (const filePath of changedPaths) {
      const read = readCardFile(filePath, this.config);
      if (!read.ok) {
        console.error(`[board] Warning: skipping changed card file ${filePath}: ${read.error}`);
        continue;
      }
      const card = read.value;
      const slug = cardSlug(card);
      touched.add(slug);

      const existing = this.findCard(slug);
      if (existing) {
        this.cards = this.cards.map((other) => (other === existing ? card : other));
      } else {
        this.cards.push(card);
      }
      summary.updated++;
    }

    for (const slug of deletedSlugs) {
      if (touched.has(slug)) continue;
      const gone = this.cards.filter(
        (card) =>
          cardSlug(card) === slug && !existsSync(cardFilePath(this.directory, card.column, slug, this.config))
      );
      if (gone.length === 0) continue;

      this.cards = this.cards.filter((card) => !gone.includes(card));
      summary.removed += gone.length;
    }

    this.cards = sortByPosition(this.cards);
    return summary;
  }

  /**
   * Replace the in-memory board with what is on disk.
   */
  reloadBoard(): Result<void, BoardLoaderError> {
    const loaded = loadBoard(this.directory, this.config);
    if (!loaded.ok) return loaded;
    this.board = loaded.value.board;
    this.cards = loaded.value.cards;
    return Ok(undefined);
  }

  /**
   * Route a watcher's notifications into this service and start it.
   */
  attachWatcher(watcher: BoardWatcher): Result<void, Error> {
    watcher.onCardsChanged((changedPaths, deletedSlugs) => {
      this.applyCardChanges(changedPaths, deletedSlugs);
    });
    watcher.onBoardChanged(() => {
      const reloaded = this.reloadBoard();
      if (!reloaded.ok) {
        console.error(`[board] Reload failed: ${describeLoaderError(reloaded.error)}`);
      }
    });
    return watcher.start();
  }

  private findCard(slug: string): Card | undefined {
    return this.cards.find((card) => cardSlug(card) === slug);
  }

  private firstMissing(slugs: string[]): string | undefined {
    return slugs.find((slug) => !this.findCard(slug));
  }

  private findLabel(id: string): Label | undefined {
    return this.board.labels.find((label) => label.id === id);
  }

  private hasColumn(id: string): boolean {
    return this.board.columns.some((column) => column.id === id);
  }

  private cardsInColumn(column: string): Card[] {
    return this.cards.filter((card) => card.column === column);
  }

  private titleTaken(title: string, except?: Card): boolean {
    return this.cards.some((card) => card !== except && card.title === title);
  }

  private slugTaken(slug: string, except?: Card): boolean {
    return this.cards.some((card) => card !== except && cardSlug(card) === slug);
  }

  private insert(card: Card): void {
    this.cards = sortByPosition([...this.cards, card]);
  }

  private replace(previous: Card, card: Card): void {
    this.cards = sortByPosition(this.cards.map((other) => (other === previous ? card : other)));
  }

  /** Validates and writes `board`, then makes it current. */
  private saveBoardWith(board: Board): Result<Board, BoardServiceError> {
    const invalid = validateColumns(board);
    if (invalid) {
      return Err<BoardServiceError>({ kind: "invalidBoardFile", reason: invalid });
    }
    const saved = saveBoard(board, this.directory, this.config);
    if (!saved.ok) return saved;
    this.board = board;
    return Ok(this.getBoard());
  }
}

function positionBetween(previous: Card | undefined, next: Card | undefined): string {
  if (previous && next) return between(previous.position, next.position);
  if (previous) return after(previous.position);
  if (next) return before(next.position);
  return first();
}

/** `items` rearranged to follow `ids`, which must name each item exactly once. */
function reorder<T extends { id: string }>(items: T[], ids: string[], noun: string): Result<T[], BoardServiceError> {
  if (new Set(ids).size !== ids.length) {
    return Err<BoardServiceError>({ kind: "invalidOrder", reason: `a ${noun} id is listed twice` });
  }
  const ordered: T[] = [];
  for (const id of ids) {
    const item = items.find((candidate) => candidate.id === id);
    if (!item) return Err<BoardServiceError>({ kind: "invalidOrder", reason: `unknown ${noun} "${id}"` });
    ordered.push(item);
  }
  if (ordered.length !== items.length) {
    return Err<BoardServiceError>({ kind: "invalidOrder", reason: `every ${noun} must be listed` });
  }
  return Ok(ordered);
}
