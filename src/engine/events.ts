import type { ColorTag, PieceKind, RotationDirection, Tick } from "./types";

export type DomainEvent =
  | {
      kind: "PieceSpawned";
      pieceKind: PieceKind;
      rotation: number;
      row: number;
      col: number;
      color: ColorTag;
      tick: Tick;
    }
  | {
      kind: "Moved";
      fromRow: number;
      fromCol: number;
      toRow: number;
      toCol: number;
      tick: Tick;
    }
  | {
      kind: "Rotated";
      dir: RotationDirection;
      fromRotation: number;
      toRotation: number;
      tick: Tick;
    }
  | { kind: "HardDropped"; distance: number; tick: Tick }
  | {
      kind: "Locked";
      source: "gravity" | "hardDrop";
      pieceKind: PieceKind;
      tick: Tick;
    }
  | { kind: "LinesCleared"; rows: Array<number>; tick: Tick }
  | { kind: "TopOut"; pieceKind: PieceKind; tick: Tick };
