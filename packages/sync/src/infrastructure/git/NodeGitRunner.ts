/**
 * Runs git as a child process in the board directory.
 */

import { spawn } from "node:child_process";
import { Err, Ok, type Result } from "@plainboard/core";
import type { GitRunner } from "../../core/ports/GitRunner.js";

/**
 * Environment for git runs: no credential prompts on a terminal nobody
 * watches, and untranslated messages so failures can be classified.
 */
export function gitEnvironment(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  return { ...base, GIT_TERMINAL_PROMPT: "0", LC_ALL: "C" };
}

export class NodeGitRunner implements GitRunner {
  constructor(
    private readonly directory: string,
    private readonly timeoutMs: number = 30000
  ) {}

  /**
   * Failures carry stderr, or stdout when git wrote its explanation there.
   */
  exec(args: string[]): Promise<Result<string, string>> {
    return new Promise((resolve) => {
      const child = spawn("git", args, { cwd: this.directory, env: gitEnvironment() });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let done = false;

      const finish = (result: Result<string, string>): void => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        resolve(result);
      };

      const timer = setTimeout(() => {
        child.kill("SIGTERM");
        finish(Err(`git ${args[0] ?? ""} timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("close", (code) => {
        const out = Buffer.concat(stdout).toString("utf-8");
        if (code === 0) {
          finish(Ok(out));
          return;
        }
        const message = Buffer.concat(stderr).toString("utf-8").trim() || out.trim();
        finish(Err(message || `git exited with code ${code ?? "null"}`));
      });

      child.on("error", (error) => finish(Err(`Failed to spawn git: ${error.message}`)));
    });
  }
}
