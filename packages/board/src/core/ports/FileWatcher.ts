import type { Result } from "@plainboard/core";

/**
 * Card files that changed on disk: absolute paths of files that exist, and
 * slugs of files that were removed.
 */
export type CardsChangedCallback = (changedPaths: string[], deletedSlugs: string[]) => void;

export type BoardChangedCallback = () => void;

/**
 * Port for noticing out-of-band edits to a board directory.
 */
export interface BoardWatcher {
  readonly directory: string;

  isWatching(): boolean;

  onCardsChanged(callback: CardsChangedCallback): void;

  onBoardChanged(callback: BoardChangedCallback): void;

  start(): Result<void, Error>;

  stop(): void;
}
