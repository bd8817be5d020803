export type { Result } from "./result.js";
export {
  Ok,
  Err,
  map,
  mapErr,
  andThen,
  unwrapOr,
  tryCatch,
  tryCatchAsync,
} from "./result.js";

export type { ToolResponse } from "./mcp.js";
export {
  textResponse,
  jsonResponse,
  errorResponse,
  resultToResponse,
} from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
