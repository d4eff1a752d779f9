export {
  applyCommand,
  hardDrop,
  init,
  step,
  stepN,
  tick,
  tryMove,
  tryRotate,
  type Outcome,
} from "./engine";
export { GameEngine } from "./engine/game-engine";
export { isGameOverResult } from "./engine/types";
export {
  DEFAULT_ENGINE_CONFIG,
  createEngineConfig,
  loadEngineConfigFromEnv,
  parseEngineConfig,
} from "./engine/config";
export { EngineConfigError } from "./engine/errors";
export { PIECE_KINDS, rotationStates, stateExtent } from "./engine/core/pieces";
export { createSeededRandom } from "./engine/core/rng/seeded";
export { SequenceRandom } from "./engine/core/rng/sequence";
export * from "./engine/selectors";

export type { Command } from "./engine/commands";
export type { DomainEvent } from "./engine/events";
export type {
  ActivePiece,
  Board,
  CellValue,
  ColorTag,
  EngineConfig,
  EngineResult,
  GameState,
  MoveDirection,
  Phase,
  PieceKind,
  RandomSource,
  RotationDirection,
} from "./engine/types";
