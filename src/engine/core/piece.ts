import { rotationState, rotationStateCount, stateExtent } from "./pieces";
import {
  type ActivePiece,
  type CellPosition,
  type Extent,
  type RotationDirection,
  type RotationState,
  gridCoordAsNumber,
} from "./types";

export function currentState(piece: ActivePiece): RotationState {
  return rotationState(piece.kind, piece.rotation);
}

// Absolute board cells covered by the piece
export function occupiedCells(piece: ActivePiece): ReadonlyArray<CellPosition> {
  const row = gridCoordAsNumber(piece.row);
  const col = gridCoordAsNumber(piece.col);
  return currentState(piece).map(([r, c]) => ({ col: col + c, row: row + r }));
}

/**
 * Bounding box of the current rotation state's offsets. Relative to the
 * anchor, not the board.
 */
export function pieceExtent(piece: ActivePiece): Extent {
  return stateExtent(currentState(piece));
}

export function rotatedStateIndex(
  piece: ActivePiece,
  direction: RotationDirection,
): number {
  const n = rotationStateCount(piece.kind);
  const step = direction === "CW" ? 1 : -1;
  return (piece.rotation + step + n) % n;
}
