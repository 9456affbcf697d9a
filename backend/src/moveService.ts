import { checkMove, createBoard, describePiece, findPiece, getPossibleMoves } from "@rookery/shared";
import type { ErrorResponse, LegalMovesResponse, MoveCheckResponse } from "@rookery/shared";
import { legalMovesRequestSchema, moveCheckRequestSchema } from "./schemas";

export type ServiceResult<T> = { status: 200; body: T } | { status: 400 | 404; body: ErrorResponse };

const badRequest = (error: string): ServiceResult<never> => ({ status: 400, body: { error } });

const notFound = (error: string): ServiceResult<never> => ({ status: 404, body: { error } });

/**
 * Answers move questions about a position the caller sends along with each
 * request. Nothing is kept between calls.
 */
export class MoveService {
  legalMoves(payload: unknown): ServiceResult<LegalMovesResponse> {
    const parseResult = legalMovesRequestSchema.safeParse(payload);
    if (!parseResult.success) {
      return badRequest("Invalid request payload");
    }
    const { from } = parseResult.data;
    const board = createBoard(parseResult.data.pieces);
    if (!board.ok) {
      return badRequest(board.error);
    }

    const piece = findPiece(board.value, from);
    if (!piece.ok) {
      return notFound(piece.error);
    }

    return {
      status: 200,
      body: {
        from,
        piece: piece.value,
        label: describePiece(piece.value),
        moves: getPossibleMoves(piece.value, board.value)
      }
    };
  }

  checkMove(payload: unknown): ServiceResult<MoveCheckResponse> {
    const parseResult = moveCheckRequestSchema.safeParse(payload);
    if (!parseResult.success) {
      return badRequest("Invalid request payload");
    }
    const { from, to } = parseResult.data;
    const board = createBoard(parseResult.data.pieces);
    if (!board.ok) {
      return badRequest(board.error);
    }

    const result = checkMove(board.value, from, to);
    if (!result.ok) {
      return notFound(result.error);
    }
    return { status: 200, body: { from, to, legal: result.value } };
  }
}
