/**
 * Bulk tools - board_bulk_archive, board_bulk_delete, board_bulk_move.
 * Every slug is checked before any card changes.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import type { ToolRegistrar } from "./types.js";

interface SlugsInput {
  slugs: string[];
}

interface BulkMoveInput extends SlugsInput {
  column: string;
}

const slugs = z.array(z.string()).min(1).describe("Card slugs");

export const registerBoardBulk: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_bulk_archive",
    {
      title: "Archive cards",
      description: "Move several cards into the archive.",
      inputSchema: { slugs },
    },
    async (input: SlugsInput) =>
      resultToResponse(
        board.archiveCards(input.slugs),
        (paths) => jsonResponse({ archived: paths.length, paths }),
        describeBoardServiceError
      )
  );

  server.registerTool(
    "board_bulk_delete",
    {
      title: "Delete cards",
      description: "Permanently delete several cards and their files.",
      inputSchema: { slugs },
    },
    async (input: SlugsInput) =>
      resultToResponse(
        board.deleteCards(input.slugs),
        (deleted) => jsonResponse({ deleted }),
        describeBoardServiceError
      )
  );

  server.registerTool(
    "board_bulk_move",
    {
      title: "Move cards",
      description: "Move several cards to the end of a column, keeping their order. Cards already there stay put.",
      inputSchema: {
        slugs,
        column: z.string().describe("Target column id"),
      },
    },
    async (input: BulkMoveInput) =>
      resultToResponse(
        board.moveCards(input.slugs, input.column),
        (moved) => jsonResponse({ moved }),
        describeBoardServiceError
      )
  );
};
