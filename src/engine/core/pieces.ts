// Shape catalog: right-handed Nintendo rotation system, one table per kind.
// Rotation is a lookup into these states, never a geometric transform.
import shapeTable from "./shapes.json";

import {
  type Extent,
  type Offset,
  type PieceKind,
  type RotationState,
} from "./types";

// Catalog order; randomizer draws are indices into this list
export const PIECE_KINDS: ReadonlyArray<PieceKind> = [
  "I",
  "O",
  "J",
  "L",
  "S",
  "Z",
  "T",
] as const;

export const KIND_COUNT = PIECE_KINDS.length;

function toOffset(pair: ReadonlyArray<number>, kind: PieceKind): Offset {
  const [dRow, dCol] = pair;
  if (pair.length !== 2 || dRow === undefined || dCol === undefined) {
    throw new Error(`Shape table entry for ${kind} is not a [row, col] pair`);
  }
  if (!Number.isInteger(dRow) || !Number.isInteger(dCol)) {
    throw new Error(`Shape table entry for ${kind} has non-integer offsets`);
  }
  return [dRow, dCol] as const;
}

function toStates(
  raw: ReadonlyArray<ReadonlyArray<ReadonlyArray<number>>>,
  kind: PieceKind,
): ReadonlyArray<RotationState> {
  if (raw.length === 0) {
    throw new Error(`Shape table has no rotation states for ${kind}`);
  }
  return raw.map((state) => {
    if (state.length === 0) {
      throw new Error(`Shape table has an empty rotation state for ${kind}`);
    }
    return state.map((pair) => toOffset(pair, kind));
  });
}

const ROTATION_STATES: Readonly<
  Record<PieceKind, ReadonlyArray<RotationState>>
> = {
  I: toStates(shapeTable.I, "I"),
  J: toStates(shapeTable.J, "J"),
  L: toStates(shapeTable.L, "L"),
  O: toStates(shapeTable.O, "O"),
  S: toStates(shapeTable.S, "S"),
  T: toStates(shapeTable.T, "T"),
  Z: toStates(shapeTable.Z, "Z"),
};

export function rotationStates(kind: PieceKind): ReadonlyArray<RotationState> {
  return ROTATION_STATES[kind];
}

export function rotationStateCount(kind: PieceKind): number {
  return ROTATION_STATES[kind].length;
}

export function rotationState(kind: PieceKind, rotation: number): RotationState {
  const state = ROTATION_STATES[kind][rotation];
  if (state === undefined) {
    throw new Error(
      `Rotation ${String(rotation)} out of range for ${kind} (${String(rotationStateCount(kind))} states)`,
    );
  }
  return state;
}

export function kindAt(index: number): PieceKind {
  const kind = PIECE_KINDS[index];
  if (kind === undefined) {
    throw new Error(`Piece index ${String(index)} out of range`);
  }
  return kind;
}

export function kindIndex(kind: PieceKind): number {
  return PIECE_KINDS.indexOf(kind);
}

/**
 * Bounding box of a rotation state's offsets, relative to the pivot.
 */
export function stateExtent(state: RotationState): Extent {
  const [first, ...rest] = state;
  if (first === undefined) {
    throw new Error("Cannot take the extent of an empty rotation state");
  }
  let rowMin = first[0];
  let rowMax = first[0];
  let colMin = first[1];
  let colMax = first[1];
  for (const [dRow, dCol] of rest) {
    rowMin = Math.min(rowMin, dRow);
    rowMax = Math.max(rowMax, dRow);
    colMin = Math.min(colMin, dCol);
    colMax = Math.max(colMax, dCol);
  }
  return { colMax, colMin, rowMax, rowMin };
}

export const extentWidth = (e: Extent): number => e.colMax - e.colMin + 1;
export const extentHeight = (e: Extent): number => e.rowMax - e.rowMin + 1;

// Largest footprint over every state of every kind; boards must host it
export const MAX_EXTENT_WIDTH = Math.max(
  ...PIECE_KINDS.flatMap((k) =>
    rotationStates(k).map((s) => extentWidth(stateExtent(s))),
  ),
);
export const MAX_EXTENT_HEIGHT = Math.max(
  ...PIECE_KINDS.flatMap((k) =>
    rotationStates(k).map((s) => extentHeight(stateExtent(s))),
  ),
);
