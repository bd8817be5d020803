/**
 * board_delete tool - Remove a card permanently.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import type { ToolRegistrar } from "./types.js";

interface DeleteInput {
  slug: string;
}

export const registerBoardDelete: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_delete",
    {
      title: "Delete card",
      description: "Delete a card and its file. Prefer board_archive to keep history.",
      inputSchema: {
        slug: z.string().describe("Card slug"),
      },
    },
    async (input: DeleteInput) =>
      resultToResponse(
        board.deleteCard(input.slug),
        () => jsonResponse({ deleted: true, slug: input.slug }),
        describeBoardServiceError
      )
  );
};
