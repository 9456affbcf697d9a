import { BACK_RANK, BACK_RANK_ORDER, BOARD_SIZE, PAWN_START_RANK, PIECE_COLORS } from "./constants";
import { coordKey, isInsideBoard } from "./board";
import { clonePiece, createPiece } from "./piece";
import { getPossibleMoves, isValidMove } from "./movement";
import type { BoardQuery, Coord, CoordKey } from "./board";
import type { Piece, ValidationResult } from "../types";

const validatePlacement = (pieces: Piece[]): ValidationResult<void> => {
  const seen = new Set<CoordKey>();
  for (const piece of pieces) {
    const { position } = piece;
    if (!Number.isInteger(position.file) || !Number.isInteger(position.rank)) {
      return { ok: false, error: "Piece coordinates must be integers" };
    }
    if (!isInsideBoard(position)) {
      return { ok: false, error: "Piece coordinates must be on the board" };
    }
    const key = coordKey(position);
    if (seen.has(key)) {
      return { ok: false, error: "Piece squares must be unique" };
    }
    seen.add(key);
  }
  return { ok: true, value: undefined };
};

/**
 * Builds an immutable occupancy snapshot. Pieces are copied in and copied
 * back out, so nothing a caller holds can move a piece off its square.
 */
export const createBoard = (pieces: Piece[]): ValidationResult<BoardQuery> => {
  const validation = validatePlacement(pieces);
  if (!validation.ok) {
    return validation;
  }

  const squares = new Map<CoordKey, Piece>();
  pieces.forEach((piece) => squares.set(coordKey(piece.position), clonePiece(piece)));

  const board: BoardQuery = {
    isValidPosition: (coord) => isInsideBoard(coord),
    isOccupied: (coord) => squares.has(coordKey(coord)),
    getPiece: (coord) => {
      const piece = squares.get(coordKey(coord));
      return piece && clonePiece(piece);
    }
  };
  return { ok: true, value: board };
};

export const listPieces = (board: BoardQuery): Piece[] => {
  const pieces: Piece[] = [];
  for (let rank = 0; rank < BOARD_SIZE; rank += 1) {
    for (let file = 0; file < BOARD_SIZE; file += 1) {
      const square = { file, rank };
      if (!board.isOccupied(square)) continue;
      const piece = board.getPiece(square);
      if (piece) {
        pieces.push(piece);
      }
    }
  }
  return pieces;
};

export const createStandardPosition = (): Piece[] =>
  PIECE_COLORS.flatMap((color) => [
    ...BACK_RANK_ORDER.map((variant, file) => createPiece(color, variant, { file, rank: BACK_RANK[color] })),
    ...Array.from({ length: BOARD_SIZE }, (_, file) =>
      createPiece(color, "pawn", { file, rank: PAWN_START_RANK[color] })
    )
  ]);

export const findPiece = (board: BoardQuery, from: Coord): ValidationResult<Piece> => {
  if (!board.isValidPosition(from)) {
    return { ok: false, error: "Square is off the board" };
  }
  const piece = board.isOccupied(from) ? board.getPiece(from) : undefined;
  if (!piece) {
    return { ok: false, error: "No piece on that square" };
  }
  return { ok: true, value: piece };
};

export const getLegalMovesForSquare = (board: BoardQuery, from: Coord): ValidationResult<Coord[]> => {
  const occupant = findPiece(board, from);
  if (!occupant.ok) {
    return occupant;
  }
  return { ok: true, value: getPossibleMoves(occupant.value, board) };
};

export const checkMove = (board: BoardQuery, from: Coord, to: Coord): ValidationResult<boolean> => {
  const occupant = findPiece(board, from);
  if (!occupant.ok) {
    return occupant;
  }
  return { ok: true, value: isValidMove(occupant.value, to, board) };
};
