import type { PieceColor, PieceVariant } from "../types";

export const BOARD_SIZE = 8;
export const MAX_INDEX = BOARD_SIZE - 1;

export const PIECE_COLORS = ["white", "black"] as const;

export const PIECE_VARIANTS = ["rook", "knight", "bishop", "queen", "king", "pawn"] as const;

export const PAWN_DIRECTION: Record<PieceColor, 1 | -1> = {
  white: 1,
  black: -1
};

export const PAWN_START_RANK: Record<PieceColor, number> = {
  white: 1,
  black: 6
};

export const BACK_RANK: Record<PieceColor, number> = {
  white: 0,
  black: MAX_INDEX
};

export const BACK_RANK_ORDER: readonly PieceVariant[] = [
  "rook",
  "knight",
  "bishop",
  "queen",
  "king",
  "bishop",
  "knight",
  "rook"
];
