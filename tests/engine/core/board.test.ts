import {
  boardsEqual,
  cellsAreFree,
  clearAndCompact,
  clearRow,
  createEmptyBoard,
  getCell,
  inBounds,
  isBoardEmpty,
  rowIsFull,
  setCell,
  stampCells,
  visibleRows,
} from "@/engine/core/board";
import { createSeededRandom } from "@/engine/core/rng/seeded";
import { type Board, createCellValue } from "@/engine/core/types";

import {
  emptyBoard,
  fillBoardRow,
  rowValues,
  setBoardCell,
} from "../../test-helpers";

// Reference compaction: keep surviving rows in order, pad the top
function referenceCompact(
  board: Board,
  removed: ReadonlySet<number>,
): Array<Array<number>> {
  const survivors: Array<Array<number>> = [];
  for (let row = 0; row < board.totalRows; row++) {
    if (!removed.has(row)) survivors.push(rowValues(board, row));
  }
  const padding: Array<Array<number>> = [];
  for (let i = 0; i < removed.size; i++) {
    padding.push(new Array<number>(board.width).fill(0));
  }
  return [...padding, ...survivors];
}

function allRows(board: Board): Array<Array<number>> {
  const rows: Array<Array<number>> = [];
  for (let row = 0; row < board.totalRows; row++) {
    rows.push(rowValues(board, row));
  }
  return rows;
}

describe("createEmptyBoard", () => {
  test("adds two buffer rows above the visible area", () => {
    const board = createEmptyBoard({ height: 20, width: 10 });
    expect(board.height).toBe(20);
    expect(board.width).toBe(10);
    expect(board.bufferRows).toBe(2);
    expect(board.totalRows).toBe(22);
    expect(board.cells.length).toBe(220);
    expect(isBoardEmpty(board)).toBe(true);
  });
});

describe("inBounds", () => {
  test.each([
    [20, 10],
    [2, 4],
    [7, 13],
  ])("matches the grid rectangle for %ix%i", (height, width) => {
    const board = emptyBoard(height, width);
    for (let row = -3; row < board.totalRows + 3; row++) {
      for (let col = -3; col < width + 3; col++) {
        const expected =
          row >= 0 && row < board.totalRows && col >= 0 && col < width;
        expect(inBounds(board, row, col)).toBe(expected);
      }
    }
  });
});

describe("getCell / setCell", () => {
  test("setCell returns a new board and leaves the input alone", () => {
    const board = emptyBoard();
    const next = setCell(board, 21, 3, createCellValue(4));
    expect(getCell(next, 21, 3)).toBe(4);
    expect(getCell(board, 21, 3)).toBe(0);
    expect(next).not.toBe(board);
  });

  test("setCell with the current value returns the same board", () => {
    const board = setBoardCell(emptyBoard(), 10, 0, 2);
    expect(setCell(board, 10, 0, createCellValue(2))).toBe(board);
  });

  test("out-of-range access throws", () => {
    const board = emptyBoard();
    expect(() => getCell(board, 22, 0)).toThrow("out-of-bounds");
    expect(() => getCell(board, 0, -1)).toThrow("out-of-bounds");
    expect(() => setCell(board, -1, 0, createCellValue(1))).toThrow(
      "out-of-bounds",
    );
  });
});

describe("rowIsFull / clearRow", () => {
  test("a row is full only with every column occupied", () => {
    let board = fillBoardRow(emptyBoard(), 21, 1, [6]);
    expect(rowIsFull(board, 21)).toBe(false);
    board = setBoardCell(board, 21, 6, 5);
    expect(rowIsFull(board, 21)).toBe(true);
    expect(rowIsFull(board, 20)).toBe(false);
  });

  test("clearRow empties just that row", () => {
    let board = fillBoardRow(emptyBoard(), 21, 2);
    board = fillBoardRow(board, 20, 3, [0]);
    const cleared = clearRow(board, 21);
    expect(rowValues(cleared, 21)).toEqual(new Array(10).fill(0));
    expect(rowValues(cleared, 20)).toEqual([0, 3, 3, 3, 3, 3, 3, 3, 3, 3]);
    expect(rowIsFull(board, 21)).toBe(true);
  });
});

describe("clearAndCompact", () => {
  test("removes non-contiguous rows and drops the rest", () => {
    // 8 visible + 2 buffer = rows 0..9; rows 2, 5, 7 are removed
    let board = emptyBoard(8, 4);
    const survivorIds: Record<number, number> = {
      0: 1,
      1: 2,
      3: 3,
      4: 4,
      6: 5,
      8: 6,
      9: 7,
    };
    for (const [row, id] of Object.entries(survivorIds)) {
      board = setBoardCell(board, Number(row), 0, id);
    }
    for (const row of [2, 5, 7]) board = fillBoardRow(board, row, 7);

    const result = clearAndCompact(board, new Set([2, 5, 7]));

    const firstColumn: Array<number> = [];
    for (let row = 0; row < result.totalRows; row++) {
      firstColumn.push(getCell(result, row, 0));
    }
    expect(firstColumn).toEqual([0, 0, 0, 1, 2, 3, 4, 5, 6, 7]);
    for (let row = 0; row < result.totalRows; row++) {
      expect(rowValues(result, row).slice(1)).toEqual([0, 0, 0]);
    }
  });

  test("matches the filter-and-pad reference on random boards", () => {
    let rng = createSeededRandom("compact-property");
    const draw = (bound: number): number => {
      const r = rng.nextInt(bound);
      rng = r.newRng;
      return r.value;
    };

    for (let trial = 0; trial < 50; trial++) {
      let board = emptyBoard(6 + draw(10), 4 + draw(7));
      for (let row = 0; row < board.totalRows; row++) {
        for (let col = 0; col < board.width; col++) {
          board = setBoardCell(board, row, col, draw(8));
        }
      }
      const removed = new Set<number>();
      const count = draw(board.totalRows + 1);
      for (let i = 0; i < count; i++) removed.add(draw(board.totalRows));

      const before = allRows(board);
      const result = clearAndCompact(board, removed);
      expect(allRows(result)).toEqual(referenceCompact(board, removed));
      // Input board is never mutated
      expect(allRows(board)).toEqual(before);
    }
  });

  test("an empty row set returns the same board", () => {
    const board = fillBoardRow(emptyBoard(), 21, 1, [3]);
    expect(clearAndCompact(board, new Set())).toBe(board);
    expect(clearAndCompact(board, [])).toBe(board);
  });

  test("repeated rows count once", () => {
    let board = fillBoardRow(emptyBoard(), 21, 1);
    board = setBoardCell(board, 20, 2, 6);
    const once = clearAndCompact(board, [21]);
    const twice = clearAndCompact(board, [21, 21]);
    expect(boardsEqual(once, twice)).toBe(true);
    expect(getCell(once, 21, 2)).toBe(6);
  });

  test("out-of-range rows throw", () => {
    expect(() => clearAndCompact(emptyBoard(), [22])).toThrow(
      "out-of-bounds",
    );
  });
});

describe("cellsAreFree / stampCells", () => {
  test("off-board or occupied positions are not free", () => {
    const board = setBoardCell(emptyBoard(), 5, 5, 1);
    expect(cellsAreFree(board, [{ col: 4, row: 5 }])).toBe(true);
    expect(cellsAreFree(board, [{ col: 5, row: 5 }])).toBe(false);
    expect(cellsAreFree(board, [{ col: 10, row: 5 }])).toBe(false);
    expect(cellsAreFree(board, [{ col: 0, row: -1 }])).toBe(false);
  });

  test("stampCells writes one value to every position", () => {
    const board = stampCells(
      emptyBoard(),
      [
        { col: 0, row: 21 },
        { col: 1, row: 21 },
      ],
      createCellValue(4),
    );
    expect(rowValues(board, 21)).toEqual([4, 4, 0, 0, 0, 0, 0, 0, 0, 0]);
  });
});

describe("visibleRows", () => {
  test("skips the buffer rows", () => {
    let board = setBoardCell(emptyBoard(), 1, 0, 3);
    board = setBoardCell(board, 2, 1, 5);
    const rows = visibleRows(board);
    expect(rows.length).toBe(20);
    expect(rows[0]).toEqual([0, 5, 0, 0, 0, 0, 0, 0, 0, 0]);
  });
});
