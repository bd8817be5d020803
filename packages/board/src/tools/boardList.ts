/**
 * board_list tool - List cards with filtering.
 */

import { z } from "zod";
import { jsonResponse } from "@plainboard/core";
import { cardSlug } from "../core/BoardService.js";
import type { ToolRegistrar } from "./types.js";

interface ListInput {
  column?: string;
  labels?: string[];
  search?: string;
}

export const registerBoardList: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_list",
    {
      title: "List board cards",
      description: "List cards in position order with optional filtering. Bodies are truncated to 100 characters.",
      inputSchema: {
        column: z.string().optional().describe("Filter by column id"),
        labels: z.array(z.string()).optional().describe("Only cards carrying all of these labels"),
        search: z.string().optional().describe("Case-insensitive search in title and body"),
      },
    },
    async (input: ListInput) => {
      const cards = board.getCards(input);
      const snapshot = board.getBoard();

      return jsonResponse({
        board: snapshot.title,
        columns: snapshot.columns.map((column) => ({
          id: column.id,
          name: column.name,
          cardCount: board.getCards({ column: column.id }).length,
        })),
        cards: cards.map((card) => ({
          slug: cardSlug(card),
          title: card.title,
          column: card.column,
          labels: card.labels,
          body: card.body.substring(0, 100),
        })),
        total: cards.length,
      });
    }
  );
};
