import { Err, type Result } from "@plainboard/core";
import { describeSyncError, type SyncError, type SyncStatus, type SyncStatusListener, syncStatus } from "./model.js";
import type { SyncProvider } from "./ports/SyncProvider.js";
import { SyncStatusTracker } from "./SyncStatusTracker.js";

/**
 * Status bookkeeping shared by the concrete providers.
 */
export abstract class BaseSyncProvider implements SyncProvider {
  protected readonly tracker = new SyncStatusTracker();
  private lastError: SyncError | null = null;

  constructor(readonly directory: string) {}

  get status(): SyncStatus {
    return this.tracker.status;
  }

  onStatusChange(listener: SyncStatusListener): () => void {
    return this.tracker.onChange(listener);
  }

  abstract checkConfiguration(): Promise<void>;
  abstract sync(): Promise<Result<void, SyncError>>;
  abstract push(): Promise<Result<void, SyncError>>;
  abstract pull(): Promise<Result<void, SyncError>>;
  abstract hasLocalChanges(): Promise<boolean>;

  /**
   * Record a failure in the status and return it.
   */
  protected fail(error: SyncError): Result<never, SyncError> {
    this.lastError = error;
    if (error.kind === "conflictDetected") {
      this.tracker.transition(syncStatus.conflict);
    } else if (error.kind === "notConfigured") {
      this.tracker.transition(syncStatus.notConfigured);
    } else {
      this.tracker.transition(syncStatus.error(describeSyncError(error)));
    }
    return Err(error);
  }

  /**
   * The error sync and push answer with while the status blocks them.
   */
  protected blockingError(): SyncError | null {
    const status = this.tracker.status;
    switch (status.kind) {
      case "notConfigured":
        return { kind: "notConfigured" };
      case "conflict":
        return { kind: "conflictDetected" };
      case "error":
        return this.lastError ?? { kind: "networkError", message: status.message };
      default:
        return null;
    }
  }

  protected markConfigured(): void {
    this.lastError = null;
  }
}
