#!/usr/bin/env node
/**
 * Board MCP server.
 * Serves one board directory over stdio, with optional git sync.
 */

import { runServer } from "@plainboard/core";
import { GitSync, NoopSyncProvider, describeSyncStatus, type SyncProvider } from "@plainboard/sync";
import { BoardService } from "./core/BoardService.js";
import { DEFAULT_BOARD_CONFIG } from "./core/config.js";
import { describeLoaderError } from "./core/model.js";
import { NodeBoardWatcher } from "./infrastructure/watcher/NodeBoardWatcher.js";
import { readServerSettings, type ServerSettings } from "./settings.js";
import { startPeriodicSync } from "./syncLoop.js";
import { registerBoardTools } from "./tools/registerTools.js";

interface Services {
  settings: ServerSettings;
  board: BoardService;
  sync: SyncProvider;
  watcher: NodeBoardWatcher | null;
}

let stopSync: () => void = () => {};

runServer<Services>({
  config: {
    name: "plainboard:board",
    version: "0.1.0",
  },
  createServices: () => {
    const settings = readServerSettings();
    if (!settings.ok) {
      throw new Error(`Invalid configuration: ${settings.error}`);
    }
    const { directory } = settings.value;

    const board = BoardService.open(directory, DEFAULT_BOARD_CONFIG);
    if (!board.ok) {
      throw new Error(describeLoaderError(board.error));
    }

    return {
      settings: settings.value,
      board: board.value,
      sync: settings.value.sync === "git" ? new GitSync(directory) : new NoopSyncProvider(directory),
      watcher: settings.value.watch ? new NodeBoardWatcher(directory, DEFAULT_BOARD_CONFIG) : null,
    };
  },
  registerTools: (server, services) => {
    registerBoardTools(server, services);
  },
  onStartup: async ({ settings, board, sync, watcher }) => {
    if (watcher) {
      const started = board.attachWatcher(watcher);
      if (!started.ok) {
        console.error(`[board] Watching ${settings.directory} failed: ${started.error.message}`);
      }
    }

    await sync.checkConfiguration();
    console.error(`[board] Serving ${settings.directory} (sync: ${describeSyncStatus(sync.status)})`);
    stopSync = startPeriodicSync(sync, settings.syncIntervalMs);
  },
  onShutdown: ({ watcher }) => {
    stopSync();
    watcher?.stop();
    console.error("[board] Shut down");
  },
});
