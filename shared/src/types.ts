import type { Coord } from "./game/board";
import type { PIECE_COLORS, PIECE_VARIANTS } from "./game/constants";

export type PieceColor = (typeof PIECE_COLORS)[number];

export type PieceVariant = (typeof PIECE_VARIANTS)[number];

export interface Piece {
  readonly color: PieceColor;
  readonly variant: PieceVariant;
  readonly position: Coord;
}

export interface ValidationError {
  ok: false;
  error: string;
}

export interface ValidationSuccess<T> {
  ok: true;
  value: T;
}

export type ValidationResult<T> = ValidationError | ValidationSuccess<T>;

export interface LegalMovesResponse {
  from: Coord;
  piece: Piece;
  label: string;
  moves: Coord[];
}

export interface MoveCheckResponse {
  from: Coord;
  to: Coord;
  legal: boolean;
}

export interface PositionResponse {
  pieces: Piece[];
}

export interface ErrorResponse {
  error: string;
}
