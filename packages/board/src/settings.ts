/**
 * Server settings read from the environment.
 */

import { resolve } from "node:path";
import { Err, Ok, type Result } from "@plainboard/core";
import { z } from "zod";

const EnvSchema = z.object({
  PLAINBOARD_DIR: z.string().min(1).optional(),
  PLAINBOARD_SYNC: z.enum(["git", "none"]).default("git"),
  PLAINBOARD_SYNC_INTERVAL_MS: z.coerce.number().int().min(0).default(60000),
  PLAINBOARD_WATCH: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

export type SyncMode = "git" | "none";

export interface ServerSettings {
  directory: string;
  sync: SyncMode;
  /** 0 turns the periodic sync off. */
  syncIntervalMs: number;
  watch: boolean;
}

export function readServerSettings(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): Result<ServerSettings, string> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Err(issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid environment");
  }

  const { PLAINBOARD_DIR, PLAINBOARD_SYNC, PLAINBOARD_SYNC_INTERVAL_MS, PLAINBOARD_WATCH } = parsed.data;
  return Ok({
    directory: resolve(cwd, PLAINBOARD_DIR ?? "."),
    sync: PLAINBOARD_SYNC,
    syncIntervalMs: PLAINBOARD_SYNC_INTERVAL_MS,
    watch: PLAINBOARD_WATCH,
  });
}
