/**
 * board_move tool - Move a card to a column and position.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import { toCardView, type ToolRegistrar } from "./types.js";

interface MoveInput {
  slug: string;
  column: string;
  index?: number;
}

export const registerBoardMove: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_move",
    {
      title: "Move card",
      description: "Move a card to a column. Returns the updated card.",
      inputSchema: {
        slug: z.string().describe("Card slug"),
        column: z.string().describe("Target column id"),
        index: z.number().int().min(0).optional().describe("Position among the column's cards; end when omitted"),
      },
    },
    async (input: MoveInput) =>
      resultToResponse(
        board.moveCard(input.slug, input.column, input.index),
        (card) => jsonResponse({ moved: true, card: toCardView(card) }),
        describeBoardServiceError
      )
  );
};
