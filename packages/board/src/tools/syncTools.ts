/**
 * Sync tools - sync_status, sync_run, sync_push, sync_pull, sync_commit.
 */

import { z } from "zod";
import { errorResponse, jsonResponse, resultToResponse, type Result, type ToolResponse } from "@plainboard/core";
import {
  canPull,
  canPush,
  describeSyncError,
  describeSyncStatus,
  type SyncError,
  type SyncProvider,
} from "@plainboard/sync";
import type { ToolRegistrar } from "./types.js";

export interface CommitInput {
  message: string;
  push?: boolean;
}

export function statusView(sync: SyncProvider) {
  const status = sync.status;
  return {
    status: status.kind,
    description: describeSyncStatus(status),
    canPush: canPush(status),
    canPull: canPull(status),
  };
}

function answer(sync: SyncProvider, result: Result<void, SyncError>): ToolResponse {
  return resultToResponse(result, () => jsonResponse(statusView(sync)), describeSyncError);
}

/** sync_run: after a conflict or error the configuration is re-checked first. */
export async function runSync(sync: SyncProvider): Promise<ToolResponse> {
  if (sync.status.kind === "conflict" || sync.status.kind === "error") {
    await sync.checkConfiguration();
  }
  return answer(sync, await sync.sync());
}

export async function pushBoard(sync: SyncProvider): Promise<ToolResponse> {
  return answer(sync, await sync.push());
}

export async function pullBoard(sync: SyncProvider): Promise<ToolResponse> {
  return answer(sync, await sync.pull());
}

export async function commitBoard(sync: SyncProvider, input: CommitInput): Promise<ToolResponse> {
  if (!sync.commit) {
    return errorResponse("This board's sync provider does not make commits");
  }
  return answer(sync, await sync.commit(input.message, { andPush: input.push ?? false }));
}

export const registerSyncTools: ToolRegistrar = (server, { sync }) => {
  server.registerTool(
    "sync_status",
    {
      title: "Sync status",
      description: "Whether the board matches its remote copy and which actions are available.",
      inputSchema: {},
    },
    async () => jsonResponse(statusView(sync))
  );

  server.registerTool(
    "sync_run",
    {
      title: "Sync board",
      description:
        "Bring in remote changes where that is safe. After a conflict or error, re-checks the configuration first.",
      inputSchema: {},
    },
    async () => runSync(sync)
  );

  server.registerTool(
    "sync_push",
    {
      title: "Push board",
      description: "Send local board changes to the remote.",
      inputSchema: {},
    },
    async () => pushBoard(sync)
  );

  server.registerTool(
    "sync_pull",
    {
      title: "Pull board",
      description:
        "Bring in remote changes even when local work is pending. Uncommitted board changes are set aside and restored.",
      inputSchema: {},
    },
    async () => pullBoard(sync)
  );

  server.registerTool(
    "sync_commit",
    {
      title: "Commit board",
      description: "Commit pending board changes with a message, optionally pushing them.",
      inputSchema: {
        message: z.string().min(1).describe("Commit message"),
        push: z.boolean().optional().describe("Push after committing (default: false)"),
      },
    },
    async (input: CommitInput) => commitBoard(sync, input)
  );
};
