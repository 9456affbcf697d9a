export interface Offset {
  readonly dFile: number;
  readonly dRank: number;
}

const offset = (dFile: number, dRank: number): Offset => ({ dFile, dRank });

export const ORTHOGONAL_DIRECTIONS: readonly Offset[] = [
  offset(-1, 0),
  offset(1, 0),
  offset(0, -1),
  offset(0, 1)
];

export const DIAGONAL_DIRECTIONS: readonly Offset[] = [
  offset(-1, -1),
  offset(1, 1),
  offset(1, -1),
  offset(-1, 1)
];

export const ALL_DIRECTIONS: readonly Offset[] = [...ORTHOGONAL_DIRECTIONS, ...DIAGONAL_DIRECTIONS];

export const KNIGHT_OFFSETS: readonly Offset[] = [
  offset(-2, -1),
  offset(-2, 1),
  offset(-1, -2),
  offset(-1, 2),
  offset(1, -2),
  offset(1, 2),
  offset(2, -1),
  offset(2, 1)
];

export const KING_OFFSETS: readonly Offset[] = [
  offset(-1, -1),
  offset(-1, 0),
  offset(-1, 1),
  offset(0, -1),
  offset(0, 1),
  offset(1, -1),
  offset(1, 0),
  offset(1, 1)
];

// Forward and backward alike; the validator throws out whatever the color forbids.
export const PAWN_CANDIDATE_OFFSETS: readonly Offset[] = [
  offset(-1, 1),
  offset(-1, -1),
  offset(0, 1),
  offset(0, 2),
  offset(0, -1),
  offset(0, -2),
  offset(1, 1),
  offset(1, -1)
];

export const sign = (value: number): -1 | 0 | 1 => (value > 0 ? 1 : value < 0 ? -1 : 0);
