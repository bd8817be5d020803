import type { Result } from "@plainboard/core";
import type { Board, Card, CodecError } from "../model.js";

/**
 * Text format for board and card files.
 * Parsing a card never sets `sourceSlug`; the caller knows the filename.
 */
export interface BoardCodec {
  parseBoard(text: string): Result<Board, CodecError>;
  serializeBoard(board: Board): string;
  parseCard(text: string): Result<Card, CodecError>;
  serializeCard(card: Card): string;
}
