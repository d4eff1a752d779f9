import { getCell, visibleRows } from "./core/board";

import type { ActivePiece, CellValue, GameState, Phase } from "./types";

// Read-only surface for renderers. Rows are visible-area rows: row 0 is the
// first row below the buffer.

export const selectBoardDimensions = (
  s: GameState,
): Readonly<{ height: number; width: number }> => ({
  height: s.board.height,
  width: s.board.width,
});

export function selectVisibleCell(
  s: GameState,
  row: number,
  col: number,
): CellValue {
  if (row < 0 || row >= s.board.height) {
    throw new Error(`Visible row ${String(row)} out of range`);
  }
  return getCell(s.board, row + s.board.bufferRows, col);
}

export const selectVisibleRows = (
  s: GameState,
): ReadonlyArray<ReadonlyArray<CellValue>> => visibleRows(s.board);

export const selectScore = (s: GameState): number => s.score;
export const selectPhase = (s: GameState): Phase => s.phase;
export const selectIsGameOver = (s: GameState): boolean =>
  s.phase === "gameOver";

// Active piece accessors (safe)
export const selectActive = (s: GameState): ActivePiece | undefined =>
  s.piece ?? undefined;
