import { describe, expect, it } from "vitest";
import {
  BACK_RANK_ORDER,
  checkMove,
  createBoard,
  createPiece,
  createStandardPosition,
  getLegalMovesForSquare,
  getPossibleMoves,
  listPieces
} from "@rookery/shared";
import type { BoardQuery, Piece } from "@rookery/shared";

const standardBoard = (): BoardQuery => {
  const result = createBoard(createStandardPosition());
  if (!result.ok) {
    throw new Error(`Failed to build standard board: ${result.error}`);
  }
  return result.value;
};

describe("standard position", () => {
  it("places sixteen pieces per side", () => {
    const pieces = createStandardPosition();
    expect(pieces).toHaveLength(32);
    expect(pieces.filter((piece) => piece.color === "white")).toHaveLength(16);
    expect(pieces.filter((piece) => piece.color === "black" && piece.variant === "pawn")).toHaveLength(8);
    expect(pieces.filter((piece) => piece.color === "black" && piece.position.rank === 6)).toHaveLength(8);
  });

  it("orders the back ranks from the rook on file zero", () => {
    const whiteBackRank = createStandardPosition()
      .filter((piece) => piece.color === "white" && piece.position.rank === 0)
      .map((piece) => piece.variant);
    expect(whiteBackRank).toStrictEqual([...BACK_RANK_ORDER]);
  });

  it("gives each side twenty opening moves", () => {
    const board = standardBoard();
    const countMoves = (color: Piece["color"]): number =>
      listPieces(board)
        .filter((piece) => piece.color === color)
        .reduce((total, piece) => total + getPossibleMoves(piece, board).length, 0);
    expect(countMoves("white")).toBe(20);
    expect(countMoves("black")).toBe(20);
  });
});

describe("board snapshots", () => {
  it("lists pieces rank by rank", () => {
    const pieces = listPieces(standardBoard());
    expect(pieces).toHaveLength(32);
    expect(pieces[0]).toStrictEqual(createPiece("white", "rook", { file: 0, rank: 0 }));
    expect(pieces[31]).toStrictEqual(createPiece("black", "rook", { file: 7, rank: 7 }));
  });

  it("hands out copies of the pieces it holds", () => {
    const board = standardBoard();
    const corner = { file: 0, rank: 0 };
    const first = board.getPiece(corner);
    const second = board.getPiece(corner);
    expect(second).toStrictEqual(first);
    expect(second).not.toBe(first);
    expect(second?.position).not.toBe(first?.position);
    expect(listPieces(board)[0]).not.toBe(first);
  });

  it("rejects two pieces on one square", () => {
    const result = createBoard([
      createPiece("white", "king", { file: 4, rank: 0 }),
      createPiece("black", "king", { file: 4, rank: 0 })
    ]);
    expect(result).toStrictEqual({ ok: false, error: "Piece squares must be unique" });
  });

  it("rejects squares off the board", () => {
    const result = createBoard([createPiece("white", "rook", { file: 8, rank: 0 })]);
    expect(result).toStrictEqual({ ok: false, error: "Piece coordinates must be on the board" });
  });

  it("rejects fractional coordinates", () => {
    const result = createBoard([createPiece("white", "rook", { file: 1.5, rank: 0 })]);
    expect(result).toStrictEqual({ ok: false, error: "Piece coordinates must be integers" });
  });

  it("is unaffected by later changes to the input", () => {
    const pieces = [createPiece("white", "rook", { file: 0, rank: 0 })];
    const result = createBoard(pieces);
    if (!result.ok) {
      throw new Error(result.error);
    }
    pieces.push(createPiece("black", "rook", { file: 4, rank: 4 }));
    expect(result.value.isOccupied({ file: 4, rank: 4 })).toBe(false);
    expect(result.value.getPiece({ file: 0, rank: 0 })?.variant).toBe("rook");
  });
});

describe("square lookups", () => {
  it("generates moves for the piece on a square", () => {
    expect(getLegalMovesForSquare(standardBoard(), { file: 1, rank: 0 })).toStrictEqual({
      ok: true,
      value: [
        { file: 0, rank: 2 },
        { file: 2, rank: 2 }
      ]
    });
  });

  it("reports an empty square", () => {
    expect(getLegalMovesForSquare(standardBoard(), { file: 4, rank: 4 })).toStrictEqual({
      ok: false,
      error: "No piece on that square"
    });
  });

  it("reports a square off the board", () => {
    expect(checkMove(standardBoard(), { file: 9, rank: 0 }, { file: 0, rank: 0 })).toStrictEqual({
      ok: false,
      error: "Square is off the board"
    });
  });

  it("checks a single move for the piece on a square", () => {
    const board = standardBoard();
    expect(checkMove(board, { file: 6, rank: 0 }, { file: 5, rank: 2 })).toStrictEqual({ ok: true, value: true });
    expect(checkMove(board, { file: 6, rank: 0 }, { file: 6, rank: 2 })).toStrictEqual({ ok: true, value: false });
    expect(checkMove(board, { file: 4, rank: 6 }, { file: 4, rank: 4 })).toStrictEqual({ ok: true, value: true });
  });
});
