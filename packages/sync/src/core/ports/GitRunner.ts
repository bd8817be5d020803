import type { Result } from "@plainboard/core";

/**
 * Port for running git in the board directory.
 * Resolves to stdout on success, or the failure output.
 */
export interface GitRunner {
  exec(args: string[]): Promise<Result<string, string>>;
}
