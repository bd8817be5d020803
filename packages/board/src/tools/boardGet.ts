/**
 * board_get tool - Full details of one card.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import { toCardView, type ToolRegistrar } from "./types.js";

interface GetInput {
  slug: string;
}

export const registerBoardGet: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_get",
    {
      title: "Get card",
      description: "Get full card details including the body.",
      inputSchema: {
        slug: z.string().describe("Card slug (filename without .md)"),
      },
    },
    async (input: GetInput) =>
      resultToResponse(
        board.getCard(input.slug),
        (card) => jsonResponse(toCardView(card)),
        describeBoardServiceError
      )
  );
};
