import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Err, Ok, type Result, type ToolResponse } from "@plainboard/core";
import { GitSync, NoopSyncProvider, type GitRunner } from "@plainboard/sync";
import { commitBoard, pullBoard, runSync, statusView } from "../src/tools/syncTools.js";

type GitReply = Result<string, string>;

/**
 * Git runner answering from per-command queues; the last reply repeats and
 * unknown commands succeed with no output.
 */
class ScriptedGit implements GitRunner {
  readonly calls: string[] = [];
  private readonly replies = new Map<string, GitReply[]>();

  constructor() {
    this.on("rev-parse --git-dir", Ok(".git\n"))
      .on("rev-parse --abbrev-ref HEAD", Ok("main\n"))
      .on("remote get-url origin", Ok("git@example.com:board.git\n"));
  }

  on(command: string, ...replies: GitReply[]): this {
    this.replies.set(command, replies);
    return this;
  }

  async exec(args: string[]): Promise<GitReply> {
    const command = args.join(" ");
    this.calls.push(command);
    const queue = this.replies.get(command);
    if (!queue || queue.length === 0) return Ok("");
    const [next, ...rest] = queue;
    if (rest.length > 0) this.replies.set(command, rest);
    return next;
  }
}

const STATUS = "status --porcelain -- .";
const COUNTS = "rev-list --count --left-right HEAD...origin/main";
const PULL = "pull --rebase origin main";

function text(response: ToolResponse): string {
  return response.content.map((part) => part.text).join("\n");
}

function body(response: ToolResponse): unknown {
  return JSON.parse(text(response));
}

describe("sync tools", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("gets a diverged board moving again with a pull", async () => {
    const git = new ScriptedGit().on(COUNTS, Ok("1\t2\n"), Ok("1\t2\n"), Ok("1\t2\n"), Ok("1\t0\n"));
    const sync = new GitSync("/boards/home", git);
    await sync.checkConfiguration();
    expect(statusView(sync)).toMatchObject({ status: "diverged", canPush: true, canPull: true });

    const ran = await runSync(sync);
    expect(body(ran)).toMatchObject({ status: "diverged" });
    expect(git.calls).not.toContain(PULL);

    const pulled = await pullBoard(sync);

    expect(pulled.isError).toBeUndefined();
    expect(body(pulled)).toMatchObject({ status: "localChanges", canPush: true, canPull: false });
    expect(git.calls).toContain(PULL);
  });

  it("reports a pull that hits a conflict", async () => {
    const git = new ScriptedGit()
      .on(COUNTS, Ok("0\t1\n"))
      .on(PULL, Err("CONFLICT (content): Merge conflict in cards/todo/a.md"));
    const sync = new GitSync("/boards/home", git);
    await sync.checkConfiguration();

    const pulled = await pullBoard(sync);

    expect(pulled).toEqual({
      content: [{ type: "text", text: "Error: Conflict detected; resolve it outside plainboard, then re-check" }],
      isError: true,
    });
    expect(sync.status).toEqual({ kind: "conflict" });
    expect(git.calls).toContain("rebase --abort");
  });

  it("commits and pushes pending board changes", async () => {
    const git = new ScriptedGit().on(STATUS, Ok(" M board.md\n"), Ok(""));
    const sync = new GitSync("/boards/home", git);
    await sync.checkConfiguration();
    expect(sync.status).toEqual({ kind: "localChanges" });

    const committed = await commitBoard(sync, { message: "Move cards", push: true });

    expect(body(committed)).toMatchObject({ status: "synced" });
    expect(git.calls).toContain("commit -m Move cards");
    expect(git.calls).toContain("push origin main");
  });

  it("commits without pushing by default", async () => {
    const git = new ScriptedGit().on(STATUS, Ok(" M board.md\n"), Ok(""));
    const sync = new GitSync("/boards/home", git);
    await sync.checkConfiguration();

    await commitBoard(sync, { message: "Move cards" });

    expect(git.calls).toContain("commit -m Move cards");
    expect(git.calls).not.toContain("push origin main");
  });

  it("refuses to commit through a provider without commits", async () => {
    const sync = new NoopSyncProvider("/boards/home");

    expect(await commitBoard(sync, { message: "Move cards" })).toEqual({
      content: [{ type: "text", text: "Error: This board's sync provider does not make commits" }],
      isError: true,
    });
  });

  it("answers pull with notConfigured when there is no remote", async () => {
    const sync = new NoopSyncProvider("/boards/home");

    expect(text(await pullBoard(sync))).toBe("Error: Sync is not configured for this board");
  });
});
