import { BOARD_SIZE } from "./constants";
import type { Piece } from "../types";

export interface Coord {
  readonly file: number;
  readonly rank: number;
}

export type CoordKey = `${number},${number}`;

/**
 * Read-only view of piece occupancy. The engine only ever asks these three
 * questions; whoever owns the board keeps it in sync with piece positions.
 */
export interface BoardQuery {
  isValidPosition(coord: Coord): boolean;
  /** Unspecified off the board: check `isValidPosition` first. */
  isOccupied(coord: Coord): boolean;
  /** Only meaningful when `isOccupied(coord)` holds. */
  getPiece(coord: Coord): Piece | undefined;
}

export const coordKey = (coord: Coord): CoordKey => `${coord.file},${coord.rank}`;

export const isInsideBoard = (coord: Coord): boolean =>
  Number.isInteger(coord.file) &&
  Number.isInteger(coord.rank) &&
  coord.file >= 0 &&
  coord.file < BOARD_SIZE &&
  coord.rank >= 0 &&
  coord.rank < BOARD_SIZE;

export const offsetCoord = (coord: Coord, dFile: number, dRank: number): Coord => ({
  file: coord.file + dFile,
  rank: coord.rank + dRank
});

export const equalCoord = (a: Coord | null | undefined, b: Coord | null | undefined): boolean => {
  if (!a || !b) return false;
  return a.file === b.file && a.rank === b.rank;
};
