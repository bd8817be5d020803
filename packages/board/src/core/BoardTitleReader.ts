import { readFileSync } from "node:fs";
import { tryCatch } from "@plainboard/core";
import { DEFAULT_BOARD_CONFIG, type BoardConfig } from "./config.js";
import { boardFilePath } from "./paths.js";

/**
 * Best-effort lookup of a board's title without parsing the whole board.
 * Returns null when the file is missing, unreadable, or has no title.
 */
export function readBoardTitle(directory: string, config: BoardConfig = DEFAULT_BOARD_CONFIG): string | null {
  const text = tryCatch(() => readFileSync(boardFilePath(directory, config), "utf-8"));
  if (!text.ok) return null;

  const lines = text.value.split("\n");
  if (lines[0].trim() !== "---") return null;

  for (const line of lines.slice(1)) {
    const trimmed = line.trim();
    if (trimmed === "---") break;
    if (!/^title:/i.test(trimmed)) continue;

    let value = trimmed.slice("title:".length).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    } else if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
      value = value.slice(1, -1).replace(/''/g, "'");
    }
    if (value !== "") return value;
  }
  return null;
}
