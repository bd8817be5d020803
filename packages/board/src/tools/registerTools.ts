/**
 * Register all board and sync MCP tools.
 */

import type { McpServer } from "@plainboard/core";
import type { ToolServices } from "./types.js";

import { registerBoardList } from "./boardList.js";
import { registerBoardGet } from "./boardGet.js";
import { registerBoardAdd } from "./boardAdd.js";
import { registerBoardUpdate } from "./boardUpdate.js";
import { registerBoardMove } from "./boardMove.js";
import { registerBoardDuplicate } from "./boardDuplicate.js";
import { registerBoardDelete } from "./boardDelete.js";
import { registerBoardArchive } from "./boardArchive.js";
import { registerBoardBulk } from "./boardBulk.js";
import { registerBoardColumns } from "./boardColumns.js";
import { registerBoardLabels } from "./boardLabels.js";
import { registerSyncTools } from "./syncTools.js";

export function registerBoardTools(server: McpServer, services: ToolServices): void {
  registerBoardList(server, services);
  registerBoardGet(server, services);
  registerBoardAdd(server, services);
  registerBoardUpdate(server, services);
  registerBoardMove(server, services);
  registerBoardDuplicate(server, services);
  registerBoardDelete(server, services);
  registerBoardArchive(server, services);
  registerBoardBulk(server, services);
  registerBoardColumns(server, services);
  registerBoardLabels(server, services);
  registerSyncTools(server, services);
}
