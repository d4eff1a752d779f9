import {
  occupiedCells,
  pieceExtent,
  rotatedStateIndex,
} from "@/engine/core/piece";
import { PIECE_KINDS, rotationStateCount } from "@/engine/core/pieces";

import { createTestPiece } from "../../test-helpers";

describe("occupiedCells", () => {
  test("adds the state offsets to the anchor", () => {
    const t = createTestPiece("T", 5, 4, 0);
    expect(occupiedCells(t)).toEqual([
      { col: 4, row: 5 },
      { col: 4, row: 4 },
      { col: 3, row: 5 },
      { col: 5, row: 5 },
    ]);
  });
});

describe("pieceExtent", () => {
  test("is relative to the anchor, not the board", () => {
    const expected = { colMax: 1, colMin: -1, rowMax: 0, rowMin: -1 };
    expect(pieceExtent(createTestPiece("T", 5, 4, 0))).toEqual(expected);
    expect(pieceExtent(createTestPiece("T", 15, 2, 0))).toEqual(expected);
  });
});

describe("rotatedStateIndex", () => {
  test("CW adds one and CCW subtracts one, wrapping", () => {
    expect(rotatedStateIndex(createTestPiece("T", 5, 4, 0), "CW")).toBe(1);
    expect(rotatedStateIndex(createTestPiece("T", 5, 4, 0), "CCW")).toBe(3);
    expect(rotatedStateIndex(createTestPiece("T", 5, 4, 3), "CW")).toBe(0);
    expect(rotatedStateIndex(createTestPiece("I", 5, 4, 1), "CW")).toBe(0);
    expect(rotatedStateIndex(createTestPiece("S", 5, 4, 0), "CCW")).toBe(1);
  });

  test("single-state kinds stay put", () => {
    const o = createTestPiece("O", 5, 4, 0);
    expect(rotatedStateIndex(o, "CW")).toBe(0);
    expect(rotatedStateIndex(o, "CCW")).toBe(0);
  });

  test("CW then CCW is the identity for every kind and state", () => {
    for (const kind of PIECE_KINDS) {
      for (let rotation = 0; rotation < rotationStateCount(kind); rotation++) {
        const piece = createTestPiece(kind, 5, 4, rotation);
        const cw = rotatedStateIndex(piece, "CW");
        const back = rotatedStateIndex({ ...piece, rotation: cw }, "CCW");
        expect(back).toBe(rotation);
      }
    }
  });
});
