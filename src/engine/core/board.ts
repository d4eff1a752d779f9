import {
  type Board,
  type CellPosition,
  type CellValue,
  BUFFER_ROWS,
  createBoardCells,
  createCellValue,
} from "./types";

export type BoardDimensions = Readonly<{ height: number; width: number }>;

export function createEmptyBoard(dims: BoardDimensions): Board {
  const totalRows = dims.height + BUFFER_ROWS;
  return {
    bufferRows: BUFFER_ROWS,
    cells: createBoardCells(totalRows, dims.width),
    height: dims.height,
    totalRows,
    width: dims.width,
  };
}

export function inBounds(board: Board, row: number, col: number): boolean {
  return row >= 0 && row < board.totalRows && col >= 0 && col < board.width;
}

// Row-major storage index; callers check bounds first
export function idx(board: Board, row: number, col: number): number {
  return row * board.width + col;
}

// Safe indexer with bounds checking
export function idxSafe(board: Board, row: number, col: number): number {
  if (!Number.isInteger(row) || !Number.isInteger(col)) {
    throw new Error("idxSafe: non-integer coordinate");
  }
  if (!inBounds(board, row, col)) {
    throw new Error(
      `idxSafe: out-of-bounds (${String(row)}, ${String(col)})`,
    );
  }
  return idx(board, row, col);
}

export function getCell(board: Board, row: number, col: number): CellValue {
  return createCellValue(board.cells[idxSafe(board, row, col)] ?? 0);
}

function copyCells(board: Board): Board["cells"] {
  const newCells = createBoardCells(board.totalRows, board.width);
  newCells.set(board.cells);
  return newCells;
}

export function setCell(
  board: Board,
  row: number,
  col: number,
  value: CellValue,
): Board {
  const i = idxSafe(board, row, col);
  if (board.cells[i] === value) return board;
  const newCells = copyCells(board);
  newCells[i] = value;
  return { ...board, cells: newCells };
}

export function rowIsFull(board: Board, row: number): boolean {
  idxSafe(board, row, 0);
  for (let col = 0; col < board.width; col++) {
    if (board.cells[idx(board, row, col)] === 0) return false;
  }
  return true;
}

export function clearRow(board: Board, row: number): Board {
  const start = idxSafe(board, row, 0);
  const newCells = copyCells(board);
  newCells.fill(0, start, start + board.width);
  return { ...board, cells: newCells };
}

/**
 * Remove the given rows and drop every remaining row by the number of
 * removed rows beneath it. The freed rows at the top come back empty.
 * Rows need not be contiguous.
 */
export function clearAndCompact(
  board: Board,
  rows: ReadonlySet<number> | ReadonlyArray<number>,
): Board {
  const removed = new Set(rows);
  if (removed.size === 0) return board;
  for (const row of removed) idxSafe(board, row, 0);

  const newCells = createBoardCells(board.totalRows, board.width);
  let target = board.totalRows - 1;
  // Walk upward, copying each surviving row into the lowest free slot
  for (let source = board.totalRows - 1; source >= 0; source--) {
    if (removed.has(source)) continue;
    const from = idx(board, source, 0);
    newCells.set(
      board.cells.subarray(from, from + board.width),
      idx(board, target, 0),
    );
    target--;
  }

  return { ...board, cells: newCells };
}

// True iff every position is on the board and empty
export function cellsAreFree(
  board: Board,
  cells: ReadonlyArray<CellPosition>,
): boolean {
  for (const { col, row } of cells) {
    if (!inBounds(board, row, col)) return false;
    if (board.cells[idx(board, row, col)] !== 0) return false;
  }
  return true;
}

// Write one value into each position; positions must be on the board
export function stampCells(
  board: Board,
  cells: ReadonlyArray<CellPosition>,
  value: CellValue,
): Board {
  const newCells = copyCells(board);
  for (const { col, row } of cells) {
    newCells[idxSafe(board, row, col)] = value;
  }
  return { ...board, cells: newCells };
}

export function isBoardEmpty(board: Board): boolean {
  return board.cells.every((c) => c === 0);
}

export function boardsEqual(a: Board, b: Board): boolean {
  if (a.width !== b.width || a.totalRows !== b.totalRows) return false;
  for (let i = 0; i < a.cells.length; i++) {
    if (a.cells[i] !== b.cells[i]) return false;
  }
  return true;
}

// Visible rows only, top to bottom, as plain arrays for renderers
export function visibleRows(board: Board): ReadonlyArray<ReadonlyArray<CellValue>> {
  const rows: Array<ReadonlyArray<CellValue>> = [];
  for (let row = board.bufferRows; row < board.totalRows; row++) {
    const values: Array<CellValue> = [];
    for (let col = 0; col < board.width; col++) {
      values.push(getCell(board, row, col));
    }
    rows.push(values);
  }
  return rows;
}
