/**
 * board_duplicate tool - Copy a card next to the original.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import { toCardView, type ToolRegistrar } from "./types.js";

interface DuplicateInput {
  slug: string;
}

export const registerBoardDuplicate: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_duplicate",
    {
      title: "Duplicate card",
      description: 'Copy a card right after the original, titled "<title> (Copy)".',
      inputSchema: {
        slug: z.string().describe("Card slug"),
      },
    },
    async (input: DuplicateInput) =>
      resultToResponse(
        board.duplicateCard(input.slug),
        (card) => jsonResponse(toCardView(card)),
        describeBoardServiceError
      )
  );
};
