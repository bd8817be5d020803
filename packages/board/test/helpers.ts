import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resolveBoardConfig, type BoardConfig } from "../src/core/config.js";
import type { Card } from "../src/core/model.js";

/** Local noon, so the archive date prefix is 2024-03-15 in any time zone. */
export const NOW = new Date(2024, 2, 15, 12, 0, 0);

export function testConfig(): BoardConfig {
  const config = resolveBoardConfig({ now: () => NOW });
  if (!config.ok) throw new Error(config.error);
  return config.value;
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "board-test-"));
}

export function removeDir(directory: string): void {
  rmSync(directory, { recursive: true, force: true });
}

export const BOARD_MD = [
  "---",
  "title: Home",
  "columns:",
  "  - id: todo",
  "    name: To Do",
  "  - id: doing",
  "    name: Doing",
  "  - id: done",
  "    name: Done",
  "---",
  "",
].join("\n");

export function writeBoardFile(directory: string, text: string = BOARD_MD): void {
  writeFileSync(join(directory, "board.md"), text);
}

export function makeCard(title: string, overrides: Partial<Card> = {}): Card {
  return {
    title,
    column: "todo",
    position: "n",
    created: new Date("2024-01-05T10:00:00Z"),
    modified: new Date("2024-01-05T10:00:00Z"),
    labels: [],
    body: "",
    ...overrides,
  };
}

/**
 * Write a card file directly, bypassing the writer.
 */
export function writeCardFile(directory: string, slug: string, card: Card, config: BoardConfig): string {
  const columnDir = join(directory, "cards", card.column);
  mkdirSync(columnDir, { recursive: true });
  const filePath = join(columnDir, `${slug}.md`);
  writeFileSync(filePath, config.codec.serializeCard(card));
  return filePath;
}
