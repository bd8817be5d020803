import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { BoardChangedCallback, CardsChangedCallback } from "../src/core/ports/FileWatcher.js";
import { NodeBoardWatcher } from "../src/infrastructure/watcher/NodeBoardWatcher.js";
import { makeTempDir, removeDir, testConfig } from "./helpers.js";

describe("NodeBoardWatcher", () => {
  let dir: string;
  let watcher: NodeBoardWatcher;
  let cardsChanged: Mock<CardsChangedCallback>;
  let boardChanged: Mock<BoardChangedCallback>;

  beforeEach(() => {
    vi.useFakeTimers();
    dir = makeTempDir();
    mkdirSync(join(dir, "cards", "todo"), { recursive: true });
    writeFileSync(join(dir, "cards", "todo", "a.md"), "a");
    writeFileSync(join(dir, "cards", "todo", "b.md"), "b");

    watcher = new NodeBoardWatcher(dir, testConfig());
    cardsChanged = vi.fn<CardsChangedCallback>();
    boardChanged = vi.fn<BoardChangedCallback>();
    watcher.onCardsChanged(cardsChanged);
    watcher.onBoardChanged(boardChanged);
  });

  afterEach(() => {
    watcher.stop();
    vi.useRealTimers();
    removeDir(dir);
  });

  it("reports existing files as changed and missing ones as deleted", () => {
    watcher.handleChange("cards/todo/a.md");
    watcher.handleChange("cards/todo/gone.md");
    vi.advanceTimersByTime(100);

    expect(cardsChanged).toHaveBeenCalledTimes(1);
    expect(cardsChanged).toHaveBeenCalledWith([join(dir, "cards", "todo", "a.md")], ["gone"]);
    expect(boardChanged).not.toHaveBeenCalled();
  });

  it("reports board file changes separately", () => {
    watcher.handleChange("board.md");
    vi.advanceTimersByTime(100);

    expect(boardChanged).toHaveBeenCalledTimes(1);
    expect(cardsChanged).not.toHaveBeenCalled();
  });

  it("batches events until 100ms after the last one", () => {
    watcher.handleChange("cards/todo/a.md");
    vi.advanceTimersByTime(80);
    watcher.handleChange("cards/todo/b.md");
    vi.advanceTimersByTime(80);
    expect(cardsChanged).not.toHaveBeenCalled();

    vi.advanceTimersByTime(20);
    expect(cardsChanged).toHaveBeenCalledTimes(1);
    expect(cardsChanged).toHaveBeenCalledWith(
      [join(dir, "cards", "todo", "a.md"), join(dir, "cards", "todo", "b.md")],
      []
    );
  });

  it("reports a path once per batch", () => {
    watcher.handleChange("cards/todo/a.md");
    watcher.handleChange("cards/todo/a.md");
    vi.advanceTimersByTime(100);

    expect(cardsChanged).toHaveBeenCalledWith([join(dir, "cards", "todo", "a.md")], []);
  });

  it("accepts platform separators", () => {
    watcher.handleChange("cards\\todo\\a.md");
    vi.advanceTimersByTime(100);

    expect(cardsChanged).toHaveBeenCalledWith([join(dir, "cards", "todo", "a.md")], []);
  });

  it.each([
    "archive/2024-01-01-x.md",
    "cards/todo/a.md.tmp",
    "cards/todo/.hidden.md",
    "cards/todo/nested/x.md",
    "cards/todo.md",
    "notes.txt",
  ])("ignores %s", (relativePath) => {
    watcher.handleChange(relativePath);
    vi.advanceTimersByTime(100);

    expect(cardsChanged).not.toHaveBeenCalled();
    expect(boardChanged).not.toHaveBeenCalled();
  });

  it("drops pending events on stop", () => {
    watcher.handleChange("cards/todo/a.md");
    watcher.stop();
    vi.advanceTimersByTime(100);

    expect(cardsChanged).not.toHaveBeenCalled();
  });

  it("starts and stops watching the directory", () => {
    expect(watcher.isWatching()).toBe(false);
    expect(watcher.start()).toEqual({ ok: true, value: undefined });
    expect(watcher.isWatching()).toBe(true);

    watcher.stop();
    expect(watcher.isWatching()).toBe(false);
  });
});
