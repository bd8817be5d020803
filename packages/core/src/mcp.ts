/**
 * MCP tool response helpers.
 * Every board and sync tool answers through these so errors look the same everywhere.
 */

import type { Result } from "./result.js";

/**
 * Tool response shape accepted by McpServer.registerTool callbacks.
 */
export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * Plain text response.
 */
export function textResponse(text: string): ToolResponse {
  return { content: [{ type: "text", text }] };
}

/**
 * Pretty-printed JSON response.
 */
export function jsonResponse(value: unknown): ToolResponse {
  return textResponse(JSON.stringify(value, null, 2));
}

/**
 * Error response, flagged with isError so clients can tell it apart.
 */
export function errorResponse(message: string): ToolResponse {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Convert a Result into a tool response.
 * `describe` turns the error union into a message.
 */
export function resultToResponse<T, E>(
  result: Result<T, E>,
  formatter: (value: T) => ToolResponse,
  describe: (error: E) => string
): ToolResponse {
  if (result.ok) {
    return formatter(result.value);
  }
  return errorResponse(describe(result.error));
}
