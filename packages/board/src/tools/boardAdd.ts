/**
 * board_add tool - Create a new card.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import { toCardView, type ToolRegistrar } from "./types.js";

interface AddInput {
  title: string;
  column: string;
  body?: string;
  labels?: string[];
}

export const registerBoardAdd: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_add",
    {
      title: "Add card",
      description: "Create a card at the end of a column. Titles are unique across the board.",
      inputSchema: {
        title: z.string().min(1).describe("Card title"),
        column: z.string().describe("Column id"),
        body: z.string().optional().describe("Markdown body; the board's card template when omitted"),
        labels: z.array(z.string()).optional().describe("Label ids"),
      },
    },
    async (input: AddInput) =>
      resultToResponse(
        board.addCard(input),
        (card) => jsonResponse(toCardView(card)),
        describeBoardServiceError
      )
  );
};
