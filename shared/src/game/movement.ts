import { MAX_INDEX, PAWN_DIRECTION, PAWN_START_RANK } from "./constants";
import { equalCoord, offsetCoord } from "./board";
import {
  ALL_DIRECTIONS,
  DIAGONAL_DIRECTIONS,
  KING_OFFSETS,
  KNIGHT_OFFSETS,
  ORTHOGONAL_DIRECTIONS,
  PAWN_CANDIDATE_OFFSETS,
  sign
} from "./move";
import type { BoardQuery, Coord } from "./board";
import type { Offset } from "./move";
import type { Piece, PieceColor } from "../types";

type MoveValidator = (piece: Piece, target: Coord, board: BoardQuery) => boolean;

const displacement = (piece: Piece, target: Coord): Offset => ({
  dFile: target.file - piece.position.file,
  dRank: target.rank - piece.position.rank
});

const occupantColor = (board: BoardQuery, coord: Coord): PieceColor | undefined =>
  board.isOccupied(coord) ? board.getPiece(coord)?.color : undefined;

const canLandOn = (piece: Piece, target: Coord, board: BoardQuery): boolean =>
  occupantColor(board, target) !== piece.color;

const isOpponentAt = (piece: Piece, target: Coord, board: BoardQuery): boolean => {
  const color = occupantColor(board, target);
  return color !== undefined && color !== piece.color;
};

const isPlaced = (piece: Piece, board: BoardQuery): boolean => board.isValidPosition(piece.position);

/** Mover and target both on the board, actually displaced, and not onto one of the mover's own pieces. */
const isCandidateTarget = (piece: Piece, target: Coord, board: BoardQuery): boolean => {
  if (!isPlaced(piece, board) || !board.isValidPosition(target)) return false;
  if (equalCoord(piece.position, target)) return false;
  return canLandOn(piece, target, board);
};

// Squares strictly between `from` and `to`; the caller guarantees a straight or diagonal line.
const isPathClear = (from: Coord, to: Coord, board: BoardQuery): boolean => {
  const stepFile = sign(to.file - from.file);
  const stepRank = sign(to.rank - from.rank);
  const distance = Math.max(Math.abs(to.file - from.file), Math.abs(to.rank - from.rank));
  for (let step = 1; step < distance; step += 1) {
    if (board.isOccupied(offsetCoord(from, stepFile * step, stepRank * step))) {
      return false;
    }
  }
  return true;
};

const edgeDistance = (value: number, step: number): number => {
  if (step > 0) return MAX_INDEX - value;
  if (step < 0) return value;
  return MAX_INDEX;
};

const rayLength = (from: Coord, direction: Offset): number =>
  Math.min(edgeDistance(from.file, direction.dFile), edgeDistance(from.rank, direction.dRank));

const walkRay = (piece: Piece, direction: Offset, board: BoardQuery): Coord[] => {
  const squares: Coord[] = [];
  const limit = rayLength(piece.position, direction);
  for (let step = 1; step <= limit; step += 1) {
    const square = offsetCoord(piece.position, direction.dFile * step, direction.dRank * step);
    const color = occupantColor(board, square);
    if (color === undefined) {
      squares.push(square);
      continue;
    }
    if (color !== piece.color) {
      squares.push(square);
    }
    break;
  }
  return squares;
};

const slide = (piece: Piece, directions: readonly Offset[], board: BoardQuery): Coord[] => {
  if (!isPlaced(piece, board)) return [];
  return directions.flatMap((direction) => walkRay(piece, direction, board));
};

const jump = (piece: Piece, offsets: readonly Offset[], board: BoardQuery): Coord[] => {
  if (!isPlaced(piece, board)) return [];
  return offsets
    .map((offset) => offsetCoord(piece.position, offset.dFile, offset.dRank))
    .filter((square) => board.isValidPosition(square) && canLandOn(piece, square, board));
};

const filterCandidates = (
  piece: Piece,
  offsets: readonly Offset[],
  board: BoardQuery,
  validate: MoveValidator
): Coord[] =>
  offsets
    .map((offset) => offsetCoord(piece.position, offset.dFile, offset.dRank))
    .filter((square) => validate(piece, square, board));

export const isValidRookMove: MoveValidator = (piece, target, board) => {
  if (!isCandidateTarget(piece, target, board)) return false;
  const { dFile, dRank } = displacement(piece, target);
  if (dFile !== 0 && dRank !== 0) return false;
  return isPathClear(piece.position, target, board);
};

export const isValidKnightMove: MoveValidator = (piece, target, board) => {
  if (!isCandidateTarget(piece, target, board)) return false;
  const dFile = Math.abs(target.file - piece.position.file);
  const dRank = Math.abs(target.rank - piece.position.rank);
  return (dFile === 2 && dRank === 1) || (dFile === 1 && dRank === 2);
};

export const isValidBishopMove: MoveValidator = (piece, target, board) => {
  if (!isCandidateTarget(piece, target, board)) return false;
  const { dFile, dRank } = displacement(piece, target);
  if (Math.abs(dFile) !== Math.abs(dRank)) return false;
  return isPathClear(piece.position, target, board);
};

export const isValidQueenMove: MoveValidator = (piece, target, board) => {
  if (!isCandidateTarget(piece, target, board)) return false;
  const { dFile, dRank } = displacement(piece, target);
  const straight = dFile === 0 || dRank === 0;
  const diagonal = Math.abs(dFile) === Math.abs(dRank);
  if (!straight && !diagonal) return false;
  return isPathClear(piece.position, target, board);
};

export const isValidKingMove: MoveValidator = (piece, target, board) => {
  if (!isCandidateTarget(piece, target, board)) return false;
  const { dFile, dRank } = displacement(piece, target);
  return Math.abs(dFile) <= 1 && Math.abs(dRank) <= 1;
};

export const isValidPawnMove: MoveValidator = (piece, target, board) => {
  if (!isCandidateTarget(piece, target, board)) return false;
  const forward = PAWN_DIRECTION[piece.color];
  const { dFile, dRank } = displacement(piece, target);

  if (dRank === forward) {
    if (dFile === 0) return !board.isOccupied(target);
    if (Math.abs(dFile) === 1) return isOpponentAt(piece, target, board);
    return false;
  }

  if (dRank === 2 * forward && dFile === 0) {
    if (piece.position.rank !== PAWN_START_RANK[piece.color]) return false;
    const between = offsetCoord(piece.position, 0, forward);
    return !board.isOccupied(between) && !board.isOccupied(target);
  }

  return false;
};

export const getRookMoves = (piece: Piece, board: BoardQuery): Coord[] =>
  slide(piece, ORTHOGONAL_DIRECTIONS, board);

export const getKnightMoves = (piece: Piece, board: BoardQuery): Coord[] => jump(piece, KNIGHT_OFFSETS, board);

export const getBishopMoves = (piece: Piece, board: BoardQuery): Coord[] =>
  slide(piece, DIAGONAL_DIRECTIONS, board);

export const getQueenMoves = (piece: Piece, board: BoardQuery): Coord[] => slide(piece, ALL_DIRECTIONS, board);

export const getKingMoves = (piece: Piece, board: BoardQuery): Coord[] => jump(piece, KING_OFFSETS, board);

/** Pawn rules live only in the validator; generation filters a fixed candidate set through it. */
export const getPawnMoves = (piece: Piece, board: BoardQuery): Coord[] =>
  filterCandidates(piece, PAWN_CANDIDATE_OFFSETS, board, isValidPawnMove);

export const isValidMove = (piece: Piece, target: Coord, board: BoardQuery): boolean => {
  switch (piece.variant) {
    case "rook":
      return isValidRookMove(piece, target, board);
    case "knight":
      return isValidKnightMove(piece, target, board);
    case "bishop":
      return isValidBishopMove(piece, target, board);
    case "queen":
      return isValidQueenMove(piece, target, board);
    case "king":
      return isValidKingMove(piece, target, board);
    case "pawn":
      return isValidPawnMove(piece, target, board);
  }
};

export const getPossibleMoves = (piece: Piece, board: BoardQuery): Coord[] => {
  switch (piece.variant) {
    case "rook":
      return getRookMoves(piece, board);
    case "knight":
      return getKnightMoves(piece, board);
    case "bishop":
      return getBishopMoves(piece, board);
    case "queen":
      return getQueenMoves(piece, board);
    case "king":
      return getKingMoves(piece, board);
    case "pawn":
      return getPawnMoves(piece, board);
  }
};
