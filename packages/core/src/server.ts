/**
 * MCP server bootstrap shared by the plainboard servers.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Name and version the server announces to clients.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Builds the services the tools operate on. */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tool registration, before the transport connects. */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs on SIGTERM/SIGINT before the server closes. */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create services, register tools, install signal handlers and connect over stdio.
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "plainboard:board", version: "0.1.0" },
 *   createServices: () => {
 *     const board = BoardService.open(dir);
 *     if (!board.ok) throw new Error(describeLoaderError(board.error));
 *     return { board: board.value, sync: new NoopSyncProvider(dir) };
 *   },
 *   registerTools: (server, services) => registerBoardTools(server, services),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });
  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };
  const handleSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`[${config.name}] Shutdown failed:`, error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", handleSignal);
  process.on("SIGINT", handleSignal);

  await onStartup?.(services);
  await server.connect(transport);
}

/**
 * bootstrapServer with a fatal-error handler; the entry point servers call.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
