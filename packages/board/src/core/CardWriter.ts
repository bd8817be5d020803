/**
 * Card persistence - one markdown file per card under cards/{column}/.
 *
 * Every call that writes returns the card with its final `sourceSlug`, so
 * callers can keep addressing the file it now lives in.
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, renameSync, rmSync } from "node:fs";
import { join } from "node:path";
import { Err, Ok, type Result } from "@plainboard/core";
import { format } from "date-fns";
import { readCardFile } from "./BoardLoader.js";
import { DEFAULT_BOARD_CONFIG, type BoardConfig } from "./config.js";
import { errorMessage, listFiles, writeFileAtomic } from "./fileUtils.js";
import { ARCHIVE_COLUMN, type Card, type CardWriterError } from "./model.js";
import { archiveDirPath, cardFilePath, cardsDirPath, columnDirPath } from "./paths.js";
import { slugify } from "./slugify.js";

export interface SaveCardOptions {
  /** Title before this edit; a different value renames the file. */
  previousTitle?: string;
  /** Column before this edit; a different value moves the file. */
  previousColumn?: string;
  /** Creating a card: titles across the board are checked first. */
  isNew?: boolean;
}

function failed(reason: string): Result<never, CardWriterError> {
  return Err<CardWriterError>({ kind: "fileOperationFailed", reason });
}

function duplicate(title: string): Result<never, CardWriterError> {
  return Err<CardWriterError>({ kind: "duplicateTitle", title });
}

function isPathSegment(value: string): boolean {
  return value !== "" && value !== "." && value !== ".." && !/[\\/]/.test(value);
}

/**
 * Whether any card file in any column directory carries `title`.
 */
function titleExists(directory: string, title: string, config: BoardConfig): boolean {
  const cardsDir = cardsDirPath(directory, config);
  if (!existsSync(cardsDir)) return false;

  for (const entry of readdirSync(cardsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const columnDir = join(cardsDir, entry.name);
    for (const name of listFiles(columnDir, config.extension)) {
      const card = readCardFile(join(columnDir, name), config);
      if (card.ok && card.value.title === title) return true;
    }
  }
  return false;
}

/**
 * Whether a file named `slug` sits in any column directory, `ownPath` aside.
 * Cards are addressed by slug alone, so a slug may only be used once per board.
 */
function slugTaken(directory: string, slug: string, ownPath: string | null, config: BoardConfig): boolean {
  const cardsDir = cardsDirPath(directory, config);
  if (!existsSync(cardsDir)) return false;

  return readdirSync(cardsDir, { withFileTypes: true }).some((entry) => {
    if (!entry.isDirectory()) return false;
    const candidate = cardFilePath(directory, entry.name, slug, config);
    return candidate !== ownPath && existsSync(candidate);
  });
}

/**
 * Write a card, moving or renaming its file as needed.
 *
 * The new file is written and read back before the old one is removed, so a
 * failed write leaves the previous file in place.
 */
export function saveCard(
  card: Card,
  directory: string,
  options: SaveCardOptions = {},
  config: BoardConfig = DEFAULT_BOARD_CONFIG
): Result<Card, CardWriterError> {
  if (card.column === "") {
    return failed("Card column cannot be empty");
  }
  if (!isPathSegment(card.column)) {
    return failed(`Invalid column: ${card.column}`);
  }

  const { previousTitle, previousColumn, isNew = false } = options;
  const titleChanged = previousTitle !== undefined && previousTitle !== card.title;
  const targetSlug = titleChanged || isNew ? slugify(card.title) : (card.sourceSlug ?? slugify(card.title));
  const targetPath = cardFilePath(directory, card.column, targetSlug, config);

  try {
    if (isNew) {
      if (titleExists(directory, card.title, config)) {
        return duplicate(card.title);
      }
      // A different title that slugifies to the same stem.
      if (slugTaken(directory, targetSlug, null, config)) {
        return duplicate(card.title);
      }
    }

    let oldPath: string | null = null;
    if (previousColumn !== undefined && previousColumn !== "" && previousColumn !== card.column) {
      const oldSlug = card.sourceSlug ?? (previousTitle !== undefined ? slugify(previousTitle) : targetSlug);
      oldPath = cardFilePath(directory, previousColumn, oldSlug, config);
    } else if (titleChanged && previousTitle !== undefined) {
      const oldSlug = card.sourceSlug ?? slugify(previousTitle);
      oldPath = cardFilePath(directory, card.column, oldSlug, config);
    }

    if (titleChanged && slugTaken(directory, targetSlug, oldPath, config)) {
      return duplicate(card.title);
    }

    const moving = oldPath !== null && oldPath !== targetPath && existsSync(oldPath);
    if (moving && existsSync(targetPath)) {
      return duplicate(card.title);
    }

    mkdirSync(columnDirPath(directory, card.column, config), { recursive: true });

    const text = config.codec.serializeCard(card);
    writeFileAtomic(targetPath, text);
    if (readFileSync(targetPath, "utf-8") !== text) {
      return failed(`Verification failed after writing ${targetPath}`);
    }

    if (moving && oldPath !== null) {
      rmSync(oldPath);
    }
  } catch (error) {
    return failed(errorMessage(error));
  }

  return Ok({ ...card, sourceSlug: targetSlug });
}

/**
 * Remove a card's file. A file that is already gone is not an error.
 */
export function deleteCard(
  card: Card,
  directory: string,
  config: BoardConfig = DEFAULT_BOARD_CONFIG
): Result<void, CardWriterError> {
  const slug = card.sourceSlug ?? slugify(card.title);
  try {
    rmSync(cardFilePath(directory, card.column, slug, config), { force: true });
    return Ok(undefined);
  } catch (error) {
    return failed(errorMessage(error));
  }
}

/**
 * Move a card's file to archive/{yyyy-MM-dd}-{slug}.md, adding -2, -3, ...
 * when that name is taken. Returns the archive path.
 */
export function archiveCard(
  card: Card,
  directory: string,
  config: BoardConfig = DEFAULT_BOARD_CONFIG
): Result<string, CardWriterError> {
  const slug = card.sourceSlug ?? slugify(card.title);
  const sourcePath = cardFilePath(directory, card.column, slug, config);
  if (!existsSync(sourcePath)) {
    return failed(`Card file not found: ${sourcePath}`);
  }

  try {
    const archiveDir = archiveDirPath(directory, config);
    mkdirSync(archiveDir, { recursive: true });

    const stem = `${format(config.now(), "yyyy-MM-dd")}-${slug}`;
    let archivePath = join(archiveDir, `${stem}${config.extension}`);
    for (let counter = 2; existsSync(archivePath); counter++) {
      archivePath = join(archiveDir, `${stem}-${counter}${config.extension}`);
    }

    renameSync(sourcePath, archivePath);
    return Ok(archivePath);
  } catch (error) {
    return failed(errorMessage(error));
  }
}

/**
 * Move an archived file back to cards/{column}/{slug}.md, where the slug comes
 * from the card's current title. A card carrying the archive marker (or no
 * column) goes back to the column recorded in the archived file. A title
 * edited while archived is written into the restored file.
 */
export function unarchiveCard(
  archivePath: string,
  card: Card,
  directory: string,
  config: BoardConfig = DEFAULT_BOARD_CONFIG
): Result<Card, CardWriterError> {
  if (!existsSync(archivePath)) {
    return failed(`Archived file not found: ${archivePath}`);
  }

  const archived = readCardFile(archivePath, config);
  if (!archived.ok) {
    return failed(`Cannot read archived card: ${archived.error}`);
  }

  const column = card.column === ARCHIVE_COLUMN || card.column === "" ? archived.value.column : card.column;
  if (!isPathSegment(column) || column === ARCHIVE_COLUMN) {
    return failed(`Invalid column: ${column}`);
  }

  const slug = slugify(card.title);
  const destination = cardFilePath(directory, column, slug, config);
  if (existsSync(destination)) {
    return duplicate(card.title);
  }

  const restored: Card = { ...card, column };
  try {
    mkdirSync(columnDirPath(directory, column, config), { recursive: true });
    if (archived.value.title === card.title) {
      renameSync(archivePath, destination);
    } else {
      writeFileAtomic(destination, config.codec.serializeCard(restored));
      rmSync(archivePath);
    }
  } catch (error) {
    return failed(errorMessage(error));
  }

  return Ok({ ...restored, sourceSlug: slug });
}
