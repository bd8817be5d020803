/**
 * Label tools - board_label_add, board_label_update, board_label_remove, board_labels_reorder.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@plainboard/core";
import { describeBoardServiceError } from "../core/BoardService.js";
import type { Board } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";

interface AddLabelInput {
  name: string;
  color: string;
  id?: string;
}

interface UpdateLabelInput {
  id: string;
  name?: string;
  color?: string;
}

interface LabelIdInput {
  id: string;
}

interface OrderInput {
  ids: string[];
}

const labelsView = (board: Board) => jsonResponse({ labels: board.labels });

export const registerBoardLabels: ToolRegistrar = (server, { board }) => {
  server.registerTool(
    "board_label_add",
    {
      title: "Add label",
      description: "Define a label cards can carry. The id defaults to the slug of the name.",
      inputSchema: {
        name: z.string().min(1).describe("Display name"),
        color: z.string().min(1).describe('CSS color, e.g. "#e74c3c"'),
        id: z.string().min(1).optional().describe("Label id"),
      },
    },
    async (input: AddLabelInput) =>
      resultToResponse(board.addLabel(input.name, input.color, input.id), labelsView, describeBoardServiceError)
  );

  server.registerTool(
    "board_label_update",
    {
      title: "Update label",
      description: "Change a label's name or color.",
      inputSchema: {
        id: z.string().describe("Label id"),
        name: z.string().min(1).optional().describe("New display name"),
        color: z.string().min(1).optional().describe("New CSS color"),
      },
    },
    async ({ id, ...changes }: UpdateLabelInput) =>
      resultToResponse(board.updateLabel(id, changes), labelsView, describeBoardServiceError)
  );

  server.registerTool(
    "board_label_remove",
    {
      title: "Remove label",
      description: "Remove a label definition. Cards that carry the label keep it.",
      inputSchema: {
        id: z.string().describe("Label id"),
      },
    },
    async (input: LabelIdInput) =>
      resultToResponse(board.removeLabel(input.id), labelsView, describeBoardServiceError)
  );

  server.registerTool(
    "board_labels_reorder",
    {
      title: "Reorder labels",
      description: "Set the label order. Every label id must be listed exactly once.",
      inputSchema: {
        ids: z.array(z.string()).describe("Label ids in their new order"),
      },
    },
    async (input: OrderInput) =>
      resultToResponse(board.reorderLabels(input.ids), labelsView, describeBoardServiceError)
  );
};
