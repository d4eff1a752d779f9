import { cellsAreFree, stampCells } from "../core/board";
import { occupiedCells, rotatedStateIndex } from "../core/piece";
import {
  type ActivePiece,
  type GameState,
  type MoveDirection,
  type RotationDirection,
  EMPTY_CELL,
  createGridCoord,
  gridCoordAsNumber,
} from "../types";

type MoveResult = {
  state: GameState;
  moved: boolean;
  fromRow: number;
  fromCol: number;
  toRow: number;
  toCol: number;
};
type RotateResult = {
  state: GameState;
  rotated: boolean;
  fromRotation: number;
  toRotation: number;
};

// [dRow, dCol] per shift; pieces never move up or more than one cell
export const MOVE_DELTAS: Readonly<
  Record<MoveDirection, readonly [number, number]>
> = {
  down: [1, 0],
  left: [0, -1],
  right: [0, 1],
};

/**
 * Lift the piece off the board, test its next footprint, and put it back
 * down at the new place on success. On failure the input state is returned
 * as is, so nothing observable changes.
 */
function relocate(
  state: GameState,
  piece: ActivePiece,
  next: ActivePiece,
): GameState | null {
  const lifted = stampCells(state.board, occupiedCells(piece), EMPTY_CELL);
  const target = occupiedCells(next);
  if (!cellsAreFree(lifted, target)) return null;
  return {
    ...state,
    board: stampCells(lifted, target, next.color),
    piece: next,
  };
}

function activePiece(state: GameState): ActivePiece | null {
  return state.phase === "falling" ? state.piece : null;
}

export function tryMovePiece(
  state: GameState,
  dRow: number,
  dCol: number,
): MoveResult {
  const p = activePiece(state);
  if (!p) {
    return {
      fromCol: 0,
      fromRow: 0,
      moved: false,
      state,
      toCol: 0,
      toRow: 0,
    };
  }
  const fromRow = gridCoordAsNumber(p.row);
  const fromCol = gridCoordAsNumber(p.col);
  const next: ActivePiece = {
    ...p,
    col: createGridCoord(fromCol + dCol),
    row: createGridCoord(fromRow + dRow),
  };

  const moved = relocate(state, p, next);
  if (!moved) {
    return { fromCol, fromRow, moved: false, state, toCol: fromCol, toRow: fromRow };
  }
  return {
    fromCol,
    fromRow,
    moved: true,
    state: moved,
    toCol: fromCol + dCol,
    toRow: fromRow + dRow,
  };
}

// Rotation is tested at the current anchor only; there are no kicks
export function tryRotatePiece(
  state: GameState,
  direction: RotationDirection,
): RotateResult {
  const p = activePiece(state);
  if (!p) return { fromRotation: 0, rotated: false, state, toRotation: 0 };

  const toRotation = rotatedStateIndex(p, direction);
  if (toRotation === p.rotation) {
    // Single-state kinds (O) have nowhere to go
    return {
      fromRotation: p.rotation,
      rotated: false,
      state,
      toRotation,
    };
  }

  const rotated = relocate(state, p, { ...p, rotation: toRotation });
  if (!rotated) {
    return {
      fromRotation: p.rotation,
      rotated: false,
      state,
      toRotation: p.rotation,
    };
  }
  return { fromRotation: p.rotation, rotated: true, state: rotated, toRotation };
}

// Move down one row at a time until blocked
export function dropPiece(state: GameState): {
  state: GameState;
  distance: number;
} {
  let distance = 0;
  let r = tryMovePiece(state, 1, 0);
  let s = state;
  while (r.moved) {
    s = r.state;
    distance++;
    r = tryMovePiece(s, 1, 0);
  }
  return { distance, state: s };
}
