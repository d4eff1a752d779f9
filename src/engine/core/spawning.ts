import { cellsAreFree } from "./board";
import { occupiedCells } from "./piece";
import { rotationState, stateExtent } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type ColorTag,
  type Extent,
  type PieceKind,
  createGridCoord,
} from "./types";

/**
 * Anchor columns at which the extent stays inside [0, width).
 * Null when the extent is wider than the board.
 */
export function spawnColumnRange(
  board: Board,
  extent: Extent,
): { min: number; max: number } | null {
  const min = 0 - extent.colMin;
  const max = board.width - extent.colMax - 1;
  return min > max ? null : { max, min };
}

// Anchor row putting the topmost cell on row 0, the top of the buffer
export function spawnRow(extent: Extent): number {
  return 0 - extent.rowMin;
}

export function spawnExtent(kind: PieceKind, rotation: number): Extent {
  return stateExtent(rotationState(kind, rotation));
}

/**
 * Build a piece at its spawn row. `col` must come from spawnColumnRange.
 */
export function createSpawnPiece(opts: {
  board: Board;
  col: number;
  color: ColorTag;
  kind: PieceKind;
  rotation: number;
}): ActivePiece {
  const extent = spawnExtent(opts.kind, opts.rotation);
  const range = spawnColumnRange(opts.board, extent);
  if (range === null || opts.col < range.min || opts.col > range.max) {
    throw new Error(
      `Spawn column ${String(opts.col)} does not fit ${opts.kind} on a ${String(opts.board.width)}-wide board`,
    );
  }
  return {
    col: createGridCoord(opts.col),
    color: opts.color,
    kind: opts.kind,
    rotation: opts.rotation,
    row: createGridCoord(spawnRow(extent)),
  };
}

/**
 * Check if the spawn cells are free; a blocked spawn ends the game
 */
export function canSpawn(board: Board, piece: ActivePiece): boolean {
  return cellsAreFree(board, occupiedCells(piece));
}
