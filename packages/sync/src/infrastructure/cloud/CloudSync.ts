/**
 * Sync provider for a board that lives in a cloud-synchronized folder.
 * The host uploads and downloads on its own; this provider only reads
 * per-file transfer state and asks for pending downloads.
 */

import { existsSync } from "node:fs";
import * as path from "node:path";
import { Err, Ok, type Result } from "@plainboard/core";
import { glob } from "glob";
import { BaseSyncProvider } from "../../core/BaseSyncProvider.js";
import { syncStatus, type SyncError } from "../../core/model.js";
import type { CloudItemInspector, CloudItemState } from "../../core/ports/CloudItemInspector.js";

export interface CloudSyncOptions {
  boardFileName: string;
  cardsDirName: string;
  /** Card file extension, dot included. */
  extension: string;
}

const DEFAULT_OPTIONS: CloudSyncOptions = {
  boardFileName: "board.md",
  cardsDirName: "cards",
  extension: ".md",
};

interface PendingChanges {
  local: boolean;
  remote: boolean;
}

function isLocalPending(state: CloudItemState): boolean {
  return !state.isUploaded || state.isUploading;
}

function isRemotePending(state: CloudItemState): boolean {
  return !state.isDownloaded || state.isDownloading;
}

export class CloudSync extends BaseSyncProvider {
  private readonly options: CloudSyncOptions;
  private inContainer = false;

  constructor(
    directory: string,
    private readonly inspector: CloudItemInspector,
    options: Partial<CloudSyncOptions> = {}
  ) {
    super(directory);
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async checkConfiguration(): Promise<void> {
    const root = this.inspector.containerRoot();
    this.inContainer = root !== null && isInside(root, this.directory);
    if (!this.inContainer) {
      this.tracker.transition(syncStatus.notConfigured);
      return;
    }
    this.markConfigured();
    await this.refresh();
  }

  /**
   * Ask the host for every file that is not downloaded yet, then re-check.
   */
  async sync(): Promise<Result<void, SyncError>> {
    if (this.status.kind === "syncing") {
      return Ok(undefined);
    }
    const blocked = this.blockingError();
    if (blocked) {
      return Err(blocked);
    }

    this.tracker.transition(syncStatus.syncing);

    for (const file of await this.boardFiles()) {
      const state = await this.inspector.inspect(file);
      if (!state.ok) {
        console.error(`[sync] Could not inspect ${file}: ${state.error}`);
        continue;
      }
      if (state.value.isDownloaded || state.value.isDownloading) continue;

      const started = await this.inspector.startDownload(file);
      if (!started.ok) {
        return this.fail({ kind: "pullFailed", message: `${path.basename(file)}: ${started.error}` });
      }
    }

    await this.refresh();
    return Ok(undefined);
  }

  /** Uploads are automatic; pushing only re-reads the transfer state. */
  async push(): Promise<Result<void, SyncError>> {
    const blocked = this.blockingError();
    if (blocked) {
      return Err(blocked);
    }
    await this.refresh();
    return Ok(undefined);
  }

  /** Downloads are the only way in, so pulling is a sync. */
  async pull(): Promise<Result<void, SyncError>> {
    return this.sync();
  }

  async hasLocalChanges(): Promise<boolean> {
    if (!this.inContainer) return false;
    const pending = await this.pendingChanges();
    return pending.local;
  }

  private async refresh(): Promise<void> {
    const pending = await this.pendingChanges();
    this.tracker.observe(pending.local, pending.remote);
  }

  private async pendingChanges(): Promise<PendingChanges> {
    const pending: PendingChanges = { local: false, remote: false };
    for (const file of await this.boardFiles()) {
      const state = await this.inspector.inspect(file);
      if (!state.ok) {
        console.error(`[sync] Could not inspect ${file}: ${state.error}`);
        continue;
      }
      pending.local ||= isLocalPending(state.value);
      pending.remote ||= isRemotePending(state.value);
    }
    return pending;
  }

  private async boardFiles(): Promise<string[]> {
    const { cardsDirName, extension } = this.options;
    const cards = await glob(`${cardsDirName}/**/*${extension}`, {
      cwd: this.directory,
      absolute: true,
      nodir: true,
    });
    const boardFile = path.join(this.directory, this.options.boardFileName);
    const files = existsSync(boardFile) ? [boardFile, ...cards.sort()] : cards.sort();
    return files;
  }
}

function isInside(root: string, directory: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(directory));
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}
