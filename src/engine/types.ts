import { createEmptyBoard } from "./core/board";
import { createSeededRandom } from "./core/rng/seeded";
import { createRandomizer, type Randomizer } from "./core/rng/randomizer";
import { type ActivePiece, type Board } from "./core/types";

import { gravityIntervalTicks, type EngineConfig } from "./config";

import type { RandomSource } from "./core/rng/interface";

export * from "./core/types";
export type Tick = number & { readonly brand: "Tick" };

export { type RandomSource } from "./core/rng/interface";
export { type EngineConfig } from "./config";

export type Phase =
  | "spawning"
  | "falling"
  | "locking"
  | "lineClearing"
  | "gameOver";

export type GameState = {
  readonly cfg: EngineConfig;
  readonly board: Board;
  readonly piece: ActivePiece | null; // null only before the first spawn and after top-out
  readonly randomizer: Randomizer;
  readonly phase: Phase;
  readonly score: number; // cleared rows
  readonly gravityCounter: number; // ticks since the last gravity step
  readonly gravityInterval: number; // ticks per gravity step
  readonly tick: Tick;
};

/**
 * Outcome reported to the driver. Game over is a normal end state, not an
 * error, so it travels as its own variant.
 */
export type EngineResult =
  | { readonly kind: "ok"; readonly changed: boolean }
  | { readonly kind: "gameOver" };

export const OK_CHANGED: EngineResult = { changed: true, kind: "ok" };
export const OK_UNCHANGED: EngineResult = { changed: false, kind: "ok" };
export const GAME_OVER: EngineResult = { kind: "gameOver" };

export function isGameOverResult(
  r: EngineResult,
): r is Extract<EngineResult, { kind: "gameOver" }> {
  return r.kind === "gameOver";
}

export function mkInitialState(
  cfg: EngineConfig,
  startTick: Tick,
  rng: RandomSource = createSeededRandom(cfg.seed),
): GameState {
  return {
    board: createEmptyBoard({ height: cfg.height, width: cfg.width }),
    cfg,
    gravityCounter: 0,
    gravityInterval: gravityIntervalTicks(cfg),
    phase: "spawning",
    piece: null,
    randomizer: createRandomizer(rng),
    score: 0,
    tick: startTick,
  };
}
