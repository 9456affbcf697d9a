import { coordKey } from "./board";
import type { Coord } from "./board";
import type { Piece, PieceColor, PieceVariant } from "../types";

export const createPiece = (color: PieceColor, variant: PieceVariant, position: Coord): Piece => ({
  color,
  variant,
  position: { ...position }
});

/** Value copy of a piece. The copy is not on any board until its owner places it. */
export const clonePiece = (piece: Piece): Piece => createPiece(piece.color, piece.variant, piece.position);

export const oppositeColor = (color: PieceColor): PieceColor => (color === "white" ? "black" : "white");

export const colorName = (color: PieceColor): string => color.toLowerCase();

export const variantName = (variant: PieceVariant): string =>
  variant.charAt(0).toUpperCase() + variant.slice(1);

export const describePiece = (piece: Piece): string =>
  `${colorName(piece.color)} ${variantName(piece.variant)} at ${coordKey(piece.position)}`;
