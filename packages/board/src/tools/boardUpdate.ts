/**
 * board_update tool - Edit title, body or labels.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import { toCardView, type ToolRegistrar } from "./types.js";

interface UpdateInput {
  slug: string;
  title?: string;
  body?: string;
  labels?: string[];
}

export const registerBoardUpdate: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_update",
    {
      title: "Update card",
      description: "Update card fields. A new title renames the card file and changes its slug.",
      inputSchema: {
        slug: z.string().describe("Card slug"),
        title: z.string().min(1).optional().describe("New title"),
        body: z.string().optional().describe("New markdown body"),
        labels: z.array(z.string()).optional().describe("Replacement label ids"),
      },
    },
    async ({ slug, ...changes }: UpdateInput) =>
      resultToResponse(
        board.updateCard(slug, changes),
        (card) => jsonResponse(toCardView(card)),
        describeBoardServiceError
      )
  );
};
