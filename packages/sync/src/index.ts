/**
 * Sync package - tracks whether a board directory matches its remote copy.
 *
 * Providers:
 * - GitSync: git CLI in the board directory
 * - CloudSync: folder kept in sync by a cloud-storage host
 * - NoopSyncProvider: no remote
 */

export type {
  SyncStatus,
  SyncStatusKind,
  SyncError,
  SyncStatusListener,
  InvalidTransition,
} from "./core/model.js";
export {
  syncStatus,
  RESTING_KINDS,
  isResting,
  canPush,
  canPull,
  sameStatus,
  restingStatus,
  describeSyncStatus,
  describeSyncError,
} from "./core/model.js";
export { SyncStatusTracker } from "./core/SyncStatusTracker.js";
export { BaseSyncProvider } from "./core/BaseSyncProvider.js";
export type { SyncProvider, CommitOptions } from "./core/ports/SyncProvider.js";
export type { GitRunner } from "./core/ports/GitRunner.js";
export type { CloudItemInspector, CloudItemState } from "./core/ports/CloudItemInspector.js";

export { NodeGitRunner, gitEnvironment } from "./infrastructure/git/NodeGitRunner.js";
export { GitSync, DEFAULT_GIT_SYNC_OPTIONS } from "./infrastructure/git/GitSync.js";
export type { GitSyncOptions } from "./infrastructure/git/GitSync.js";
export { classifyGitFailure } from "./infrastructure/git/classifyGitFailure.js";
export { CloudSync } from "./infrastructure/cloud/CloudSync.js";
export type { CloudSyncOptions } from "./infrastructure/cloud/CloudSync.js";
export { NoopSyncProvider } from "./infrastructure/NoopSyncProvider.js";
