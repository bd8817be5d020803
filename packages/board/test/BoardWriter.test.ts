import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { loadBoard } from "../src/core/BoardLoader.js";
import { readBoardTitle } from "../src/core/BoardTitleReader.js";
import { createBoard, saveBoard } from "../src/core/BoardWriter.js";
import { createEmptyBoard, type Board } from "../src/core/model.js";
import { makeTempDir, removeDir, testConfig } from "./helpers.js";

const config = testConfig();

describe("BoardWriter", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("creates the directory layout and board file", () => {
    const boardDir = join(dir, "home");

    expect(createBoard(createEmptyBoard("Home"), boardDir, config)).toEqual({ ok: true, value: undefined });

    expect(existsSync(join(boardDir, "archive"))).toBe(true);
    expect(readdirSync(join(boardDir, "cards")).sort()).toEqual(["done", "in-progress", "todo"]);
    expect(readBoardTitle(boardDir, config)).toBe("Home");
  });

  it("never overwrites an existing board", () => {
    createBoard(createEmptyBoard("Home"), dir, config);

    expect(createBoard(createEmptyBoard("Other"), dir, config)).toEqual({
      ok: false,
      error: { kind: "fileOperationFailed", reason: `Board already exists at ${join(dir, "board.md")}` },
    });
    expect(readBoardTitle(dir, config)).toBe("Home");
  });

  it("saves what the loader reads back", () => {
    const board: Board = {
      title: "Q1: Plans",
      columns: [
        { id: "ideas", name: "Ideas" },
        { id: "shipped", name: "Shipped" },
      ],
      labels: [{ id: "bug", name: "Bug", color: "#e74c3c" }],
      cardTemplate: "## Acceptance",
    };

    expect(saveBoard(board, dir, config).ok).toBe(true);

    const loaded = loadBoard(dir, config);
    expect(loaded.ok && loaded.value.board).toEqual(board);
    expect(readBoardTitle(dir, config)).toBe("Q1: Plans");
    expect(readdirSync(dir).sort()).toEqual(["board.md", "cards"]);
  });
});

describe("readBoardTitle", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function withBoardText(text: string): string | null {
    writeFileSync(join(dir, "board.md"), text);
    return readBoardTitle(dir, config);
  }

  it("returns null without a board file", () => {
    expect(readBoardTitle(dir, config)).toBeNull();
  });

  it("reads plain and quoted titles", () => {
    expect(withBoardText("---\ntitle: Home\ncolumns:\n---\n")).toBe("Home");
    expect(withBoardText('---\ntitle: "Q1: Plans"\n---\n')).toBe("Q1: Plans");
    expect(withBoardText("---\ntitle: 'Bob''s: board'\n---\n")).toBe("Bob's: board");
  });

  it("matches the key case-insensitively", () => {
    expect(withBoardText("---\nTitle: Upper\n---\n")).toBe("Upper");
  });

  it("skips empty title lines", () => {
    expect(withBoardText("---\ntitle:\ntitle: Second\n---\n")).toBe("Second");
  });

  it("only looks inside the frontmatter", () => {
    expect(withBoardText("title: Loose\n")).toBeNull();
    expect(withBoardText("---\ncolumns:\n---\ntitle: After\n")).toBeNull();
  });
});
