import { createEngineConfig, type EngineConfig } from "./config";
import { spawnPiece } from "./gameplay/spawn";
import { gravityStep } from "./physics/gravity";
import {
  applyCommand as applyOne,
  applyCommands,
  handleHardDrop,
  handleMove,
  handleRotation,
  type CommandResult,
} from "./step/apply-commands";
import {
  GAME_OVER,
  OK_CHANGED,
  OK_UNCHANGED,
  isGameOverResult,
  mkInitialState,
} from "./types";
import { asTick, incrementTick } from "./utils/tick";

import type { Command } from "./commands";
import type { DomainEvent } from "./events";
import type {
  EngineResult,
  GameState,
  MoveDirection,
  RandomSource,
  RotationDirection,
  Tick,
} from "./types";

export type Outcome = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  result: EngineResult;
};

function resultOf(state: GameState, changed: boolean): EngineResult {
  if (state.phase === "gameOver") return GAME_OVER;
  return changed ? OK_CHANGED : OK_UNCHANGED;
}

function toOutcome(r: CommandResult): Outcome {
  return { events: r.events, result: resultOf(r.state, r.changed), state: r.state };
}

// Every operation on a finished game is a no-op reporting game over
function guardOver(
  state: GameState,
  run: (s: GameState) => CommandResult,
): Outcome {
  if (state.phase === "gameOver") {
    return { events: [], result: GAME_OVER, state };
  }
  return toOutcome(run(state));
}

/**
 * Build a fresh game and spawn its first piece. Throws EngineConfigError
 * for a configuration the board cannot support.
 */
export function init(
  overrides: Partial<EngineConfig> = {},
  opts: { random?: RandomSource; startTick?: Tick } = {},
): Outcome {
  const cfg = createEngineConfig(overrides);
  const state = mkInitialState(cfg, opts.startTick ?? asTick(0), opts.random);
  const sp = spawnPiece(state);
  return { events: sp.events, result: resultOf(sp.state, true), state: sp.state };
}

/**
 * One driver tick: advance the gravity counter, maybe fall or settle.
 */
export function tick(state: GameState): Outcome {
  return guardOver(state, (s) => {
    const g = gravityStep(s);
    return { ...g, state: { ...g.state, tick: incrementTick(g.state.tick) } };
  });
}

export function tryMove(state: GameState, direction: MoveDirection): Outcome {
  return guardOver(state, (s) => handleMove(s, direction));
}

export function tryRotate(
  state: GameState,
  direction: RotationDirection,
): Outcome {
  return guardOver(state, (s) => handleRotation(s, direction));
}

export function hardDrop(state: GameState): Outcome {
  return guardOver(state, handleHardDrop);
}

export function applyCommand(state: GameState, cmd: Command): Outcome {
  return guardOver(state, (s) => applyOne(s, cmd));
}

/**
 * Apply the commands that arrived since the last tick, then tick once.
 */
export function step(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): Outcome {
  return guardOver(state, (s) => {
    const a = applyCommands(s, cmds);
    if (a.state.phase === "gameOver") return a;
    const t = tick(a.state);
    const changed = a.changed || isGameOverResult(t.result) || t.result.changed;
    return { changed, events: [...a.events, ...t.events], state: t.state };
  });
}

/**
 * Advance multiple ticks with per-tick command buckets.
 */
export function stepN(
  state: GameState,
  byTick: ReadonlyArray<ReadonlyArray<Command>>,
): Outcome {
  let s = state;
  const all: Array<DomainEvent> = [];
  let changed = false;
  for (const cmds of byTick) {
    const r = step(s, cmds);
    s = r.state;
    all.push(...r.events);
    changed = changed || isGameOverResult(r.result) || r.result.changed;
  }
  return { events: all, result: resultOf(s, changed), state: s };
}
