/**
 * Board layout and collaborators, passed explicitly to every loader and
 * writer call.
 */

import { Err, Ok, type Result } from "@plainboard/core";
import { z } from "zod";
import { MarkdownCodec } from "../infrastructure/codec/MarkdownCodec.js";
import type { BoardCodec } from "./ports/BoardCodec.js";

const segment = z
  .string()
  .min(1)
  .refine((value) => !/[\\/]/.test(value) && value !== "." && value !== "..", {
    message: "must be a single path segment",
  });

export const BoardLayoutSchema = z.object({
  boardFileName: segment.default("board.md"),
  cardsDirName: segment.default("cards"),
  archiveDirName: segment.default("archive"),
  extension: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, "must look like .md")
    .default(".md"),
});

export type BoardLayout = z.infer<typeof BoardLayoutSchema>;

export interface BoardConfig extends BoardLayout {
  codec: BoardCodec;
  /** Clock used for archive date prefixes. */
  now: () => Date;
}

export const DEFAULT_BOARD_CONFIG: BoardConfig = {
  ...BoardLayoutSchema.parse({}),
  codec: new MarkdownCodec(),
  now: () => new Date(),
};

export type BoardConfigOverrides = Partial<BoardLayout> & {
  codec?: BoardCodec;
  now?: () => Date;
};

/**
 * Build a config from overrides, validating the layout fields.
 */
export function resolveBoardConfig(overrides: BoardConfigOverrides = {}): Result<BoardConfig, string> {
  const { codec, now, ...layout } = overrides;
  const parsed = BoardLayoutSchema.safeParse(layout);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Err(issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid board layout");
  }

  const clock = now ?? DEFAULT_BOARD_CONFIG.now;
  return Ok({
    ...parsed.data,
    codec: codec ?? new MarkdownCodec(clock),
    now: clock,
  });
}
