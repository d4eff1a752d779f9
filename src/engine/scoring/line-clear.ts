import { clearAndCompact, rowIsFull } from "../core/board";
import { pieceExtent } from "../core/piece";
import { type ActivePiece, type Board, gridCoordAsNumber } from "../core/types";

/**
 * Full rows among those the landed piece spans, bottom first. Only these
 * rows can have become full with this lock.
 */
export function completedRowsUnder(
  board: Board,
  piece: ActivePiece,
): Array<number> {
  const extent = pieceExtent(piece);
  const row = gridCoordAsNumber(piece.row);
  const rows: Array<number> = [];
  for (let y = row + extent.rowMax; y >= row + extent.rowMin; y--) {
    if (rowIsFull(board, y)) rows.push(y);
  }
  return rows;
}

export function clearCompletedRows(
  board: Board,
  piece: ActivePiece,
): { board: Board; rows: Array<number> } {
  const rows = completedRowsUnder(board, piece);
  if (rows.length === 0) return { board, rows };
  return { board: clearAndCompact(board, rows), rows };
}
