export type Command =
  | { kind: "MoveLeft" }
  | { kind: "MoveRight" }
  | { kind: "SoftDrop" }
  | { kind: "RotateCW" }
  | { kind: "RotateCCW" }
  | { kind: "HardDrop" };
