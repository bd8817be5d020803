/**
 * Column tools - board_column_add, board_column_rename, board_column_remove, board_columns_reorder.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import type { Board } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";

interface AddColumnInput {
  name: string;
  id?: string;
}

interface RenameColumnInput {
  id: string;
  name: string;
}

interface ColumnIdInput {
  id: string;
}

interface OrderInput {
  ids: string[];
}

const columnsView = (board: Board) => jsonResponse({ columns: board.columns });

export const registerBoardColumns: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_column_add",
    {
      title: "Add column",
      description: "Append a column to the board. The id names its directory and defaults to the slug of the name.",
      inputSchema: {
        name: z.string().min(1).describe("Display name"),
        id: z.string().min(1).optional().describe("Column id"),
      },
    },
    async (input: AddColumnInput) =>
      resultToResponse(board.addColumn(input.name, input.id), columnsView, describeBoardServiceError)
  );

  server.registerTool(
    "board_column_rename",
    {
      title: "Rename column",
      description: "Change a column's display name. Its id and directory stay the same.",
      inputSchema: {
        id: z.string().describe("Column id"),
        name: z.string().min(1).describe("New display name"),
      },
    },
    async (input: RenameColumnInput) =>
      resultToResponse(board.renameColumn(input.id, input.name), columnsView, describeBoardServiceError)
  );

  server.registerTool(
    "board_column_remove",
    {
      title: "Remove column",
      description: "Remove an empty column. The last column cannot be removed.",
      inputSchema: {
        id: z.string().describe("Column id"),
      },
    },
    async (input: ColumnIdInput) =>
      resultToResponse(board.removeColumn(input.id), columnsView, describeBoardServiceError)
  );

  server.registerTool(
    "board_columns_reorder",
    {
      title: "Reorder columns",
      description: "Set the column order. Every column id must be listed exactly once.",
      inputSchema: {
        ids: z.array(z.string()).describe("Column ids in their new order"),
      },
    },
    async (input: OrderInput) =>
      resultToResponse(board.reorderColumns(input.ids), columnsView, describeBoardServiceError)
  );
};
