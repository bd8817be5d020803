import * as fs from "node:fs";
import * as path from "node:path";
import { Err, Ok, type Result } from "@plainboard/core";
import { DEFAULT_BOARD_CONFIG, type BoardConfig } from "../../core/config.js";
import type {
  BoardChangedCallback,
  BoardWatcher,
  CardsChangedCallback,
} from "../../core/ports/FileWatcher.js";

/**
 * BoardWatcher on top of recursive fs.watch.
 * Events are collected for 100ms after the last one and reported as a batch:
 * one cards callback with every changed and deleted card, one board callback
 * when board.md was touched. Writes made by this process are reported too.
 */
export class NodeBoardWatcher implements BoardWatcher {
  private watcher: fs.FSWatcher | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly pendingCards = new Set<string>();
  private pendingBoard = false;
  private cardsCallback: CardsChangedCallback | null = null;
  private boardCallback: BoardChangedCallback | null = null;

  constructor(
    readonly directory: string,
    private readonly config: BoardConfig = DEFAULT_BOARD_CONFIG,
    private readonly debounceMs = 100
  ) {}

  onCardsChanged(callback: CardsChangedCallback): void {
    this.cardsCallback = callback;
  }

  onBoardChanged(callback: BoardChangedCallback): void {
    this.boardCallback = callback;
  }

  start(): Result<void, Error> {
    if (this.watcher) {
      this.stop();
    }

    try {
      this.watcher = fs.watch(this.directory, { recursive: true }, (_eventType, filename) => {
        if (!filename) return;
        this.handleChange(filename);
      });

      this.watcher.on("error", (error) => {
        console.error("[board] Watch error:", error.message);
      });

      return Ok(undefined);
    } catch (error) {
      return Err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  stop(): void {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pendingCards.clear();
    this.pendingBoard = false;
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  /**
   * Classify one path relative to the board directory and schedule a flush.
   * Paths outside board.md and cards/{column}/{slug}.md are ignored.
   */
  handleChange(relativePath: string): void {
    const normalized = relativePath.replace(/\\/g, "/");

    if (normalized === this.config.boardFileName) {
      this.pendingBoard = true;
      this.schedule();
      return;
    }

    const parts = normalized.split("/");
    if (parts.length !== 3 || parts[0] !== this.config.cardsDirName) return;

    const fileName = parts[2];
    if (!fileName.endsWith(this.config.extension)) return;
    const stem = fileName.slice(0, -this.config.extension.length);
    // Temp files from atomic writes ("x.md.tmp") and hidden files never match.
    if (stem === "" || stem.includes(".")) return;

    this.pendingCards.add(normalized);
    this.schedule();
  }

  private schedule(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush();
    }, this.debounceMs);
  }

  private flush(): void {
    const changedPaths: string[] = [];
    const deletedSlugs: string[] = [];

    for (const relativePath of this.pendingCards) {
      const fullPath = path.join(this.directory, relativePath);
      if (fs.existsSync(fullPath)) {
        changedPaths.push(fullPath);
      } else {
        deletedSlugs.push(path.basename(relativePath, this.config.extension));
      }
    }
    const boardChanged = this.pendingBoard;
    this.pendingCards.clear();
    this.pendingBoard = false;

    if ((changedPaths.length > 0 || deletedSlugs.length > 0) && this.cardsCallback) {
      this.cardsCallback(changedPaths, deletedSlugs);
    }
    if (boardChanged && this.boardCallback) {
      this.boardCallback();
    }
  }
}
