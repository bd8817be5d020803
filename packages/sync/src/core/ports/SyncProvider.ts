import type { Result } from "@plainboard/core";
import type { SyncError, SyncStatus, SyncStatusListener } from "../model.js";

export interface CommitOptions {
  /** Push the branch once the commit is made. */
  andPush?: boolean;
}

/**
 * Port for a remote-sync mechanism attached to one board directory.
 */
export interface SyncProvider {
  readonly directory: string;

  readonly status: SyncStatus;

  /** Returns an unsubscribe function. */
  onStatusChange(listener: SyncStatusListener): () => void;

  /**
   * Detect whether sync is available and settle in a resting status.
   * This is also the way out of `conflict` and `error`.
   */
  checkConfiguration(): Promise<void>;

  /** Bring in remote changes where that is safe. */
  sync(): Promise<Result<void, SyncError>>;

  /** Send local changes to the remote. */
  push(): Promise<Result<void, SyncError>>;

  /** Bring in remote changes even while local work is pending. */
  pull(): Promise<Result<void, SyncError>>;

  /**
   * Record pending board changes under `message`. Only providers whose
   * remote keeps a history of commits have this.
   */
  commit?(message: string, options?: CommitOptions): Promise<Result<void, SyncError>>;

  hasLocalChanges(): Promise<boolean>;
}
