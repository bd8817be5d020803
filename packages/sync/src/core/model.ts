/**
 * Sync status vocabulary shared by every sync provider.
 */

/**
 * Where the board directory stands relative to its remote copy.
 */
export type SyncStatus =
  | { kind: "notConfigured" }
  | { kind: "synced" }
  | { kind: "localChanges" }
  | { kind: "remoteChanges" }
  | { kind: "diverged" }
  | { kind: "syncing" }
  | { kind: "conflict" }
  | { kind: "error"; message: string };

export type SyncStatusKind = SyncStatus["kind"];

/**
 * Constructors for the status values.
 */
export const syncStatus = {
  notConfigured: { kind: "notConfigured" },
  synced: { kind: "synced" },
  localChanges: { kind: "localChanges" },
  remoteChanges: { kind: "remoteChanges" },
  diverged: { kind: "diverged" },
  syncing: { kind: "syncing" },
  conflict: { kind: "conflict" },
  error: (message: string): SyncStatus => ({ kind: "error", message }),
} as const satisfies Record<SyncStatusKind, SyncStatus | ((message: string) => SyncStatus)>;

/** Statuses a provider settles in between operations. */
export const RESTING_KINDS: ReadonlySet<SyncStatusKind> = new Set<SyncStatusKind>([
  "synced",
  "localChanges",
  "remoteChanges",
  "diverged",
]);

export function isResting(status: SyncStatus): boolean {
  return RESTING_KINDS.has(status.kind);
}

/**
 * Whether local changes can be sent to the remote.
 */
export function canPush(status: SyncStatus): boolean {
  return status.kind === "localChanges" || status.kind === "diverged";
}

/**
 * Whether remote changes can be brought in.
 */
export function canPull(status: SyncStatus): boolean {
  return status.kind === "remoteChanges" || status.kind === "diverged";
}

export function sameStatus(a: SyncStatus, b: SyncStatus): boolean {
  if (a.kind === "error" && b.kind === "error") {
    return a.message === b.message;
  }
  return a.kind === b.kind;
}

/**
 * Resting status for the given pending-change flags.
 */
export function restingStatus(hasLocalChanges: boolean, hasRemoteChanges: boolean): SyncStatus {
  if (hasLocalChanges && hasRemoteChanges) return syncStatus.diverged;
  if (hasLocalChanges) return syncStatus.localChanges;
  if (hasRemoteChanges) return syncStatus.remoteChanges;
  return syncStatus.synced;
}

export function describeSyncStatus(status: SyncStatus): string {
  switch (status.kind) {
    case "notConfigured":
      return "Not configured";
    case "synced":
      return "Synced";
    case "localChanges":
      return "Local changes";
    case "remoteChanges":
      return "Remote changes";
    case "diverged":
      return "Diverged";
    case "syncing":
      return "Syncing...";
    case "conflict":
      return "Conflict";
    case "error":
      return `Error: ${status.message}`;
  }
}

export type SyncError =
  | { kind: "notConfigured" }
  | { kind: "networkError"; message: string }
  | { kind: "conflictDetected" }
  | { kind: "pushFailed"; message: string }
  | { kind: "pullFailed"; message: string }
  | { kind: "authenticationFailed" }
  | { kind: "commitFailed"; message: string }
  | { kind: "nothingToCommit" };

export function describeSyncError(error: SyncError): string {
  switch (error.kind) {
    case "notConfigured":
      return "Sync is not configured for this board";
    case "networkError":
      return `Network error: ${error.message}`;
    case "conflictDetected":
      return "Conflict detected; resolve it outside plainboard, then re-check";
    case "pushFailed":
      return `Push failed: ${error.message}`;
    case "pullFailed":
      return `Pull failed: ${error.message}`;
    case "authenticationFailed":
      return "Authentication failed";
    case "commitFailed":
      return `Commit failed: ${error.message}`;
    case "nothingToCommit":
      return "No changes to commit";
  }
}

export type SyncStatusListener = (status: SyncStatus, previous: SyncStatus) => void;

export interface InvalidTransition {
  kind: "invalidTransition";
  from: SyncStatusKind;
  to: SyncStatusKind;
}
