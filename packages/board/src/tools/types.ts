/**
 * Shared types for tool registration.
 */

import type { McpServer } from "@plainboard/core";
import type { SyncProvider } from "@plainboard/sync";
import type { BoardService } from "../core/BoardService.js";
import { cardSlug } from "../core/BoardService.js";
import { formatDate } from "../infrastructure/codec/MarkdownCodec.js";
import type { Card } from "../core/model.js";

export interface ToolServices {
  board: BoardService;
  sync: SyncProvider;
}

/**
 * Function type for registering a tool with an MCP server.
 */
export interface ToolRegistrar {
  (server: McpServer, services: ToolServices): void;
}

/**
 * JSON shape of a card in tool responses.
 */
export interface CardView {
  slug: string;
  title: string;
  column: string;
  position: string;
  labels: string[];
  created: string;
  modified: string;
  body: string;
}

export function toCardView(card: Card): CardView {
  return {
    slug: cardSlug(card),
    title: card.title,
    column: card.column,
    position: card.position,
    labels: card.labels,
    created: formatDate(card.created),
    modified: formatDate(card.modified),
    body: card.body,
  };
}
