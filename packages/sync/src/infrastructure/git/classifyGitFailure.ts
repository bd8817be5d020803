import type { SyncError } from "../../core/model.js";

const AUTH_PATTERNS = [
  /authentication failed/i,
  /permission denied/i,
  /could not read username/i,
  /invalid username or password/i,
  /access denied/i,
];

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /unable to access/i,
  /connection (refused|timed out|reset)/i,
  /network is unreachable/i,
  /could not read from remote repository/i,
  /timed out/i,
];

/**
 * Map git failure output to an authentication or network error.
 * Returns null for anything else so callers can pick their own error.
 */
export function classifyGitFailure(output: string): SyncError | null {
  if (AUTH_PATTERNS.some((pattern) => pattern.test(output))) {
    return { kind: "authenticationFailed" };
  }
  if (NETWORK_PATTERNS.some((pattern) => pattern.test(output))) {
    return { kind: "networkError", message: firstLine(output) };
  }
  return null;
}

export function firstLine(output: string): string {
  const [line = ""] = output.trim().split("\n");
  return line.trim();
}
