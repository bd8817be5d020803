import { Err, Ok, type Result } from "@plainboard/core";
import {
  isResting,
  restingStatus,
  sameStatus,
  syncStatus,
  type InvalidTransition,
  type SyncStatus,
  type SyncStatusListener,
} from "./model.js";

function isAllowed(from: SyncStatus, to: SyncStatus): boolean {
  switch (to.kind) {
    case "error":
    case "notConfigured":
      return true;
    case "syncing":
      return isResting(from);
    case "conflict":
      return from.kind === "syncing";
    default:
      return true;
  }
}

/**
 * Holds the current sync status and enforces the transition table.
 *
 * Resting states (synced, localChanges, remoteChanges, diverged) can be entered
 * from anywhere, which is also how conflict and error are left once a
 * configuration re-check succeeds. `syncing` is only entered from a resting
 * state; `conflict` only from `syncing`.
 */
export class SyncStatusTracker {
  private current: SyncStatus;
  private readonly listeners = new Set<SyncStatusListener>();

  constructor(initial: SyncStatus = syncStatus.notConfigured) {
    this.current = initial;
  }

  get status(): SyncStatus {
    return this.current;
  }

  transition(next: SyncStatus): Result<void, InvalidTransition> {
    if (sameStatus(this.current, next)) {
      return Ok(undefined);
    }
    if (!isAllowed(this.current, next)) {
      console.error(`[sync] Rejected status transition ${this.current.kind} -> ${next.kind}`);
      return Err<InvalidTransition>({ kind: "invalidTransition", from: this.current.kind, to: next.kind });
    }

    const previous = this.current;
    this.current = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
    return Ok(undefined);
  }

  /** Settle in the resting status for the given flags. */
  observe(hasLocalChanges: boolean, hasRemoteChanges: boolean): Result<void, InvalidTransition> {
    return this.transition(restingStatus(hasLocalChanges, hasRemoteChanges));
  }

  onChange(listener: SyncStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
