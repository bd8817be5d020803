/**
 * Markdown files with a YAML frontmatter header, read and written through
 * gray-matter.
 *
 * Card:
 *   ---
 *   title: Fix bug
 *   column: todo
 *   position: 'n'
 *   created: '2024-01-05T10:00:00Z'
 *   modified: '2024-01-05T10:00:00Z'
 *   labels:
 *     - bug
 *   ---
 *
 *   body
 *
 * Board frontmatter carries `title`, a `columns` list of id/name entries and an
 * optional `labels` list; the body is the card template.
 */

import { Err, Ok, tryCatch, type Result } from "@plainboard/core";
import { isValid, parseISO } from "date-fns";
import matter from "gray-matter";
import { z } from "zod";
import type { Board, Card, CodecError, Column, Label } from "../../core/model.js";
import type { BoardCodec } from "../../core/ports/BoardCodec.js";

/** YAML resolves bare numbers and booleans; card fields are text. */
const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const CardFrontmatterSchema = z.object({
  title: scalar.nullish(),
  column: scalar.nullish(),
  position: scalar.nullish(),
  created: z.unknown(),
  modified: z.unknown(),
  labels: z.union([z.array(scalar.nullable()), scalar]).nullish(),
});

const BoardFrontmatterSchema = z.object({
  title: scalar.nullish(),
  columns: z.array(z.unknown()).nullish(),
  labels: z.array(z.unknown()).nullish(),
});

const ColumnEntrySchema = z.object({ id: scalar, name: scalar });
const LabelEntrySchema = z.object({ id: scalar, name: scalar, color: scalar });

interface ParsedDocument {
  data: unknown;
  body: string;
}

/** ISO-8601 at second precision in UTC. */
export function formatDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function readDocument(text: string): Result<ParsedDocument, CodecError> {
  if (!matter.test(text)) {
    return Err<CodecError>({ kind: "missingFrontmatter" });
  }
  // gray-matter only caches calls made without options.
  const parsed = tryCatch(() => matter(text, {}));
  if (!parsed.ok) {
    return Err<CodecError>({ kind: "invalidFrontmatter", reason: parsed.error.message });
  }
  return Ok({ data: parsed.value.data, body: parsed.value.content.trim() });
}

function writeDocument(data: object, body: string): string {
  return matter.stringify(body === "" ? "" : `\n${body}`, data);
}

function invalid(error: z.ZodError): CodecError {
  const issue = error.issues[0];
  return {
    kind: "invalidFrontmatter",
    reason: issue ? `${issue.path.join(".")}: ${issue.message}` : "unreadable frontmatter",
  };
}

function toDate(value: unknown, fallback: Date): Date {
  if (value instanceof Date) return isValid(value) ? value : fallback;
  if (typeof value !== "string") return fallback;
  const date = parseISO(value);
  return isValid(date) ? date : fallback;
}

function toLabels(value: string | (string | null)[] | null | undefined): string[] {
  if (value === null || value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  return list
    .map((label) => (label ?? "").trim())
    .filter((label) => label !== "");
}

/** Keeps the list entries that match the schema. */
function entries<S extends z.ZodTypeAny>(values: unknown[] | null | undefined, schema: S): z.output<S>[] {
  const result: z.output<S>[] = [];
  for (const value of values ?? []) {
    const entry = schema.safeParse(value);
    if (entry.success) result.push(entry.data);
  }
  return result;
}

export class MarkdownCodec implements BoardCodec {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  parseCard(text: string): Result<Card, CodecError> {
    const document = readDocument(text);
    if (!document.ok) return document;

    const fields = CardFrontmatterSchema.safeParse(document.value.data);
    if (!fields.success) return Err(invalid(fields.error));

    const { title, column, position } = fields.data;
    if (!title) return Err<CodecError>({ kind: "missingRequiredField", field: "title" });
    if (!column) return Err<CodecError>({ kind: "missingRequiredField", field: "column" });
    if (!position) return Err<CodecError>({ kind: "missingRequiredField", field: "position" });

    const now = this.clock();
    return Ok({
      title,
      column,
      position,
      created: toDate(fields.data.created, now),
      modified: toDate(fields.data.modified, now),
      labels: toLabels(fields.data.labels),
      body: document.value.body,
    });
  }

  serializeCard(card: Card): string {
    return writeDocument(
      {
        title: card.title,
        column: card.column,
        position: card.position,
        created: formatDate(card.created),
        modified: formatDate(card.modified),
        labels: card.labels,
      },
      card.body
    );
  }

  parseBoard(text: string): Result<Board, CodecError> {
    const document = readDocument(text);
    if (!document.ok) return document;

    const fields = BoardFrontmatterSchema.safeParse(document.value.data);
    if (!fields.success) return Err(invalid(fields.error));

    const title = fields.data.title;
    if (!title) return Err<CodecError>({ kind: "missingRequiredField", field: "title" });

    const columns: Column[] = entries(fields.data.columns, ColumnEntrySchema);
    if (columns.length === 0) {
      return Err<CodecError>({ kind: "missingRequiredField", field: "columns" });
    }
    const labels: Label[] = entries(fields.data.labels, LabelEntrySchema);

    return Ok({ title, columns, labels, cardTemplate: document.value.body });
  }

  serializeBoard(board: Board): string {
    const data: Record<string, unknown> = {
      title: board.title,
      columns: board.columns.map(({ id, name }) => ({ id, name })),
    };
    if (board.labels.length > 0) {
      data.labels = board.labels.map(({ id, name, color }) => ({ id, name, color }));
    }
    return writeDocument(data, board.cardTemplate);
  }
}
