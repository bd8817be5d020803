import { Err, type Result } from "@plainboard/core";
import { BaseSyncProvider } from "../core/BaseSyncProvider.js";
import type { SyncError } from "../core/model.js";

/**
 * Provider for boards without a remote. Stays `notConfigured`.
 */
export class NoopSyncProvider extends BaseSyncProvider {
  async checkConfiguration(): Promise<void> {}

  async sync(): Promise<Result<void, SyncError>> {
    return Err<SyncError>({ kind: "notConfigured" });
  }

  async push(): Promise<Result<void, SyncError>> {
    return Err<SyncError>({ kind: "notConfigured" });
  }

  async pull(): Promise<Result<void, SyncError>> {
    return Err<SyncError>({ kind: "notConfigured" });
  }

  async hasLocalChanges(): Promise<boolean> {
    return false;
  }
}
