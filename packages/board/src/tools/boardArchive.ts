/**
 * Archive tools - board_archive, board_archived, board_restore.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import { describeLoaderError } from "../core/model.js";
import { toCardView, type ToolRegistrar } from "./types.js";

interface SlugInput {
  slug: string;
}

export const registerBoardArchive: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_archive",
    {
      title: "Archive card",
      description: "Move a card into the archive. It can be brought back with board_restore.",
      inputSchema: {
        slug: z.string().describe("Card slug"),
      },
    },
    async (input: SlugInput) =>
      resultToResponse(
        board.archiveCard(input.slug),
        (archivePath) => jsonResponse({ archived: true, path: archivePath }),
        describeBoardServiceError
      )
  );

  server.registerTool(
    "board_archived",
    {
      title: "List archived cards",
      description: "List archived cards, newest first. Their slugs carry the archive date.",
      inputSchema: {},
    },
    async () =>
      resultToResponse(
        board.getArchivedCards(),
        (cards) => jsonResponse({ cards: cards.map(toCardView), total: cards.length }),
        describeLoaderError
      )
  );

  server.registerTool(
    "board_restore",
    {
      title: "Restore archived card",
      description: "Move an archived card back to the column it was archived from.",
      inputSchema: {
        slug: z.string().describe("Archived card slug, as listed by board_archived"),
      },
    },
    async (input: SlugInput) =>
      resultToResponse(
        board.restoreArchivedCard(input.slug),
        (card) => jsonResponse(toCardView(card)),
        describeBoardServiceError
      )
  );
};
