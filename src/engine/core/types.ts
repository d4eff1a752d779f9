// Board geometry constants
export const BUFFER_ROWS = 2 as const; // invisible rows 0..1 above the visible area

// Grid coordinates - for board positions (must be integers)
declare const GridCoordBrand: unique symbol;
export type GridCoord = number & { readonly [GridCoordBrand]: true };
export const gridCoordAsNumber = (g: GridCoord): number => g as number;

// Cell values - 0=empty, 1-7=color tags
declare const CellValueBrand: unique symbol;
export type CellValue = (0 | 1 | 2 | 3 | 4 | 5 | 6 | 7) & {
  readonly [CellValueBrand]: true;
};

// A non-empty cell value carried by a piece
declare const ColorTagBrand: unique symbol;
export type ColorTag = CellValue & { readonly [ColorTagBrand]: true };

export const COLOR_COUNT = 7 as const;

// GridCoord constructor
export function createGridCoord(value: number): GridCoord {
  if (!Number.isInteger(value)) {
    throw new Error("GridCoord must be an integer");
  }
  return value as GridCoord;
}

// CellValue constructor
export function createCellValue(value: number): CellValue {
  if (!Number.isInteger(value) || value < 0 || value > 7) {
    throw new Error("CellValue must be an integer from 0 to 7");
  }
  return value as CellValue;
}

export const EMPTY_CELL: CellValue = createCellValue(0);

// ColorTag constructor
export function createColorTag(value: number): ColorTag {
  if (!Number.isInteger(value) || value < 1 || value > COLOR_COUNT) {
    throw new Error("ColorTag must be an integer from 1 to 7");
  }
  return value as ColorTag;
}

// Board storage, row-major, row 0 is the top buffer row
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint8Array & { readonly [BoardCellsBrand]: true };

export function createBoardCells(totalRows: number, width: number): BoardCells {
  return new Uint8Array(totalRows * width) as BoardCells;
}

export type Board = {
  readonly width: number;
  readonly height: number; // visible height only
  readonly bufferRows: number; // rows above the visible area (0..bufferRows-1)
  readonly totalRows: number; // height + bufferRows
  readonly cells: BoardCells;
};

// Pieces and rotation
export type PieceKind = "I" | "O" | "J" | "L" | "S" | "Z" | "T";
export type RotationDirection = "CW" | "CCW";
export type MoveDirection = "left" | "right" | "down";

// [rowDelta, colDelta] relative to the piece pivot
export type Offset = readonly [number, number];
export type RotationState = ReadonlyArray<Offset>;

export type Extent = Readonly<{
  rowMin: number;
  rowMax: number;
  colMin: number;
  colMax: number;
}>;

export type CellPosition = Readonly<{ row: number; col: number }>;

export type ActivePiece = {
  readonly kind: PieceKind;
  readonly rotation: number; // index into the kind's rotation states
  readonly row: GridCoord;
  readonly col: GridCoord;
  readonly color: ColorTag;
};
