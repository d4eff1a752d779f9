import {
  MOVE_DELTAS,
  dropPiece,
  tryMovePiece,
  tryRotatePiece,
} from "../gameplay/movement";

import { settlePiece } from "./resolve-transitions";

import type { Command } from "../commands";
import type { DomainEvent } from "../events";
import type {
  GameState,
  MoveDirection,
  RotationDirection,
} from "../types";

export type CommandResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  changed: boolean;
};

/**
 * Helper function to create CommandResult objects more ergonomically
 */
function createCommandResult(opts: {
  state: GameState;
  events?: ReadonlyArray<DomainEvent>;
  changed?: boolean;
}): CommandResult {
  return {
    changed: opts.changed ?? false,
    events: opts.events ?? [],
    state: opts.state,
  };
}

/**
 * Handles a one-cell shift: left, right or one row down
 */
export function handleMove(
  state: GameState,
  direction: MoveDirection,
): CommandResult {
  const [dRow, dCol] = MOVE_DELTAS[direction];
  const r = tryMovePiece(state, dRow, dCol);
  if (r.moved) {
    return createCommandResult({
      changed: true,
      events: [
        {
          fromCol: r.fromCol,
          fromRow: r.fromRow,
          kind: "Moved",
          tick: state.tick,
          toCol: r.toCol,
          toRow: r.toRow,
        },
      ],
      state: r.state,
    });
  }
  return createCommandResult({ state });
}

/**
 * Handles rotation commands
 */
export function handleRotation(
  state: GameState,
  direction: RotationDirection,
): CommandResult {
  const r = tryRotatePiece(state, direction);
  if (r.rotated) {
    return createCommandResult({
      changed: true,
      events: [
        {
          dir: direction,
          fromRotation: r.fromRotation,
          kind: "Rotated",
          tick: state.tick,
          toRotation: r.toRotation,
        },
      ],
      state: r.state,
    });
  }
  return createCommandResult({ state });
}

/**
 * Handles hard drop: fall until blocked, settle, restart the gravity count
 */
export function handleHardDrop(state: GameState): CommandResult {
  if (state.phase !== "falling") return createCommandResult({ state });

  const dropped = dropPiece(state);
  const settled = settlePiece(dropped.state, "hardDrop");
  return createCommandResult({
    changed: true,
    events: [
      { distance: dropped.distance, kind: "HardDropped", tick: state.tick },
      ...settled.events,
    ],
    state: { ...settled.state, gravityCounter: 0 },
  });
}

/**
 * Maps commands to their appropriate handlers
 */
export function applyCommand(state: GameState, cmd: Command): CommandResult {
  switch (cmd.kind) {
    case "MoveLeft":
      return handleMove(state, "left");
    case "MoveRight":
      return handleMove(state, "right");
    case "SoftDrop":
      return handleMove(state, "down");
    case "RotateCW":
      return handleRotation(state, "CW");
    case "RotateCCW":
      return handleRotation(state, "CCW");
    case "HardDrop":
      return handleHardDrop(state);
  }
}

export function applyCommands(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): CommandResult {
  let s = state;
  const events: Array<DomainEvent> = [];
  let changed = false;

  for (const cmd of cmds) {
    const result = applyCommand(s, cmd);
    s = result.state;
    events.push(...result.events);
    changed = changed || result.changed;
  }

  return { changed, events, state: s };
}
