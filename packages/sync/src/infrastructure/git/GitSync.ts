/**
 * Git-backed sync provider.
 * Runs the git CLI in the board directory; git itself does the transfer.
 */

import { Err, Ok, type Result } from "@plainboard/core";
import { BaseSyncProvider } from "../../core/BaseSyncProvider.js";
import { canPush, syncStatus, type SyncError } from "../../core/model.js";
import type { GitRunner } from "../../core/ports/GitRunner.js";
import type { CommitOptions } from "../../core/ports/SyncProvider.js";
import { classifyGitFailure, firstLine } from "./classifyGitFailure.js";
import { NodeGitRunner } from "./NodeGitRunner.js";

export interface GitSyncOptions {
  remote: string;
  /** Message for the commit `push` makes of pending board changes. */
  commitMessage: string;
}

export const DEFAULT_GIT_SYNC_OPTIONS: GitSyncOptions = {
  remote: "origin",
  commitMessage: "Update board",
};

interface AheadBehind {
  ahead: number;
  behind: number;
}

export class GitSync extends BaseSyncProvider {
  private readonly options: GitSyncOptions;
  private branch: string | null = null;

  constructor(
    directory: string,
    private readonly git: GitRunner = new NodeGitRunner(directory),
    options: Partial<GitSyncOptions> = {}
  ) {
    super(directory);
    this.options = { ...DEFAULT_GIT_SYNC_OPTIONS, ...options };
  }

  /** Current branch; null before configuration or on a detached HEAD. */
  get currentBranch(): string | null {
    return this.branch;
  }

  async checkConfiguration(): Promise<void> {
    const gitDir = await this.git.exec(["rev-parse", "--git-dir"]);
    if (!gitDir.ok) {
      this.branch = null;
      this.tracker.transition(syncStatus.notConfigured);
      return;
    }

    const head = await this.git.exec(["rev-parse", "--abbrev-ref", "HEAD"]);
    const branch = head.ok ? head.value.trim() : "";
    this.branch = branch === "" || branch === "HEAD" ? null : branch;

    const remote = await this.git.exec(["remote", "get-url", this.options.remote]);
    if (!remote.ok) {
      this.tracker.transition(syncStatus.notConfigured);
      return;
    }

    this.markConfigured();
    await this.refresh();
  }

  /**
   * Fetch, then fast-forward with a rebase when the board folder is clean and
   * only the remote moved. Skipped while another operation is running.
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

    const fetched = await this.git.exec(["fetch", this.options.remote]);
    if (!fetched.ok) {
      return this.fail(classifyGitFailure(fetched.error) ?? { kind: "networkError", message: firstLine(fetched.error) });
    }

    if ((await this.hasLocalChanges()) || this.branch === null) {
      await this.refresh();
      return Ok(undefined);
    }

    const counts = await this.aheadBehind();
    if (counts && counts.behind > 0 && counts.ahead === 0) {
      const pulled = await this.git.exec(["pull", "--rebase", this.options.remote, this.branch]);
      if (!pulled.ok) {
        const classified = classifyGitFailure(pulled.error);
        if (classified) {
          return this.fail(classified);
        }
        await this.abortRebase();
        return this.fail({ kind: "conflictDetected" });
      }
    }

    await this.refresh();
    return Ok(undefined);
  }

  /**
   * Commit pending board-folder changes, then push the branch.
   */
  async push(): Promise<Result<void, SyncError>> {
    const blocked = this.blockingError();
    if (blocked) {
      return Err(blocked);
    }
    if (!canPush(this.status)) {
      return Err<SyncError>({ kind: "pushFailed", message: "Nothing to push" });
    }
    if (this.branch === null) {
      return Err<SyncError>({ kind: "pushFailed", message: "No branch checked out" });
    }

    this.tracker.transition(syncStatus.syncing);

    if (await this.hasLocalChanges()) {
      const committed = await this.stageAndCommit(this.options.commitMessage);
      if (!committed.ok && committed.error.kind !== "nothingToCommit") {
        return this.fail(committed.error);
      }
    }

    return this.pushBranch(this.branch);
  }

  /**
   * Pull with a rebase, stashing uncommitted board changes around it.
   */
  async pull(): Promise<Result<void, SyncError>> {
    const blocked = this.blockingError();
    if (blocked) {
      return Err(blocked);
    }
    if (this.branch === null) {
      return Err<SyncError>({ kind: "pullFailed", message: "No branch checked out" });
    }
    if (this.status.kind === "syncing") {
      return Err<SyncError>({ kind: "pullFailed", message: "Another sync operation is running" });
    }

    this.tracker.transition(syncStatus.syncing);

    let stashed = false;
    if (await this.hasLocalChanges()) {
      const stash = await this.git.exec(["stash", "push", "-m", "plainboard auto-stash"]);
      if (!stash.ok) {
        return this.fail({ kind: "pullFailed", message: "Failed to stash changes" });
      }
      stashed = true;
    }

    const pulled = await this.git.exec(["pull", "--rebase", this.options.remote, this.branch]);
    if (!pulled.ok) {
      await this.abortRebase();
      if (stashed) {
        await this.popStash();
      }
      return this.fail(classifyGitFailure(pulled.error) ?? { kind: "conflictDetected" });
    }

    if (stashed && !(await this.popStash())) {
      return this.fail({ kind: "conflictDetected" });
    }

    await this.refresh();
    return Ok(undefined);
  }

  /**
   * Stage and commit everything under the board folder, optionally pushing.
   * An empty working tree answers `nothingToCommit` without touching the status.
   */
  async commit(message: string, options: CommitOptions = {}): Promise<Result<void, SyncError>> {
    if (message.trim() === "") {
      return Err<SyncError>({ kind: "commitFailed", message: "Commit message cannot be empty" });
    }
    const blocked = this.blockingError();
    if (blocked) {
      return Err(blocked);
    }
    if (this.status.kind === "syncing") {
      return Err<SyncError>({ kind: "commitFailed", message: "Another sync operation is running" });
    }

    this.tracker.transition(syncStatus.syncing);

    const committed = await this.stageAndCommit(message);
    if (!committed.ok) {
      if (committed.error.kind === "nothingToCommit") {
        await this.refresh();
        return committed;
      }
      return this.fail(committed.error);
    }

    if (options.andPush) {
      if (this.branch === null) {
        await this.refresh();
        return Err<SyncError>({ kind: "pushFailed", message: "No branch checked out" });
      }
      return this.pushBranch(this.branch);
    }

    await this.refresh();
    return Ok(undefined);
  }

  /**
   * Uncommitted changes inside the board folder only, so a board can live
   * inside a larger repository.
   */
  async hasLocalChanges(): Promise<boolean> {
    const status = await this.git.exec(["status", "--porcelain", "--", "."]);
    return status.ok && status.value.trim() !== "";
  }

  private async refresh(): Promise<void> {
    const dirty = await this.hasLocalChanges();
    const counts = (await this.aheadBehind()) ?? { ahead: 0, behind: 0 };
    this.tracker.observe(dirty || counts.ahead > 0, counts.behind > 0);
  }

  private async aheadBehind(): Promise<AheadBehind | null> {
    if (this.branch === null) return null;

    const result = await this.git.exec([
      "rev-list",
      "--count",
      "--left-right",
      `HEAD...${this.options.remote}/${this.branch}`,
    ]);
    if (!result.ok) return null;

    const parts = result.value.trim().split(/\s+/).map(Number);
    if (parts.length !== 2 || parts.some(Number.isNaN)) return null;
    const [ahead = 0, behind = 0] = parts;
    return { ahead, behind };
  }

  private async stageAndCommit(message: string): Promise<Result<void, SyncError>> {
    const added = await this.git.exec(["add", "--", "."]);
    if (!added.ok) {
      return Err<SyncError>({ kind: "commitFailed", message: firstLine(added.error) });
    }

    const committed = await this.git.exec(["commit", "-m", message]);
    if (!committed.ok) {
      if (committed.error.includes("nothing to commit")) {
        return Err<SyncError>({ kind: "nothingToCommit" });
      }
      return Err<SyncError>({ kind: "commitFailed", message: firstLine(committed.error) });
    }
    return Ok(undefined);
  }

  private async pushBranch(branch: string): Promise<Result<void, SyncError>> {
    const pushed = await this.git.exec(["push", this.options.remote, branch]);
    if (!pushed.ok) {
      return this.fail(classifyGitFailure(pushed.error) ?? { kind: "pushFailed", message: firstLine(pushed.error) });
    }
    await this.refresh();
    return Ok(undefined);
  }

  private async abortRebase(): Promise<void> {
    const aborted = await this.git.exec(["rebase", "--abort"]);
    if (!aborted.ok) {
      console.error("[sync] git rebase --abort failed:", firstLine(aborted.error));
    }
  }

  private async popStash(): Promise<boolean> {
    const popped = await this.git.exec(["stash", "pop"]);
    if (!popped.ok) {
      console.error("[sync] git stash pop failed:", firstLine(popped.error));
    }
    return popped.ok;
  }
}
