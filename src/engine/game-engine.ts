import {
  applyCommand,
  hardDrop,
  init,
  tick,
  tryMove,
  tryRotate,
  type Outcome,
} from "./index";
import {
  selectActive,
  selectBoardDimensions,
  selectIsGameOver,
  selectPhase,
  selectScore,
  selectVisibleCell,
  selectVisibleRows,
} from "./selectors";

import type { Command } from "./commands";
import type { EngineConfig } from "./config";
import type { DomainEvent } from "./events";
import type {
  ActivePiece,
  CellValue,
  EngineResult,
  GameState,
  MoveDirection,
  Phase,
  RandomSource,
  RotationDirection,
} from "./types";

/**
 * Single owner of one game for a driver. Wraps the pure engine functions,
 * keeps the current state and buffers domain events until drained.
 *
 * The driver calls tick() at its fixed cadence and forwards player input
 * between ticks; renderers use the read-only query methods.
 */
export class GameEngine {
  private state: GameState;
  private pending: Array<DomainEvent> = [];

  constructor(
    config: Partial<EngineConfig> = {},
    opts: { random?: RandomSource } = {},
  ) {
    const r = init(config, opts);
    this.state = r.state;
    this.pending.push(...r.events);
  }

  private commit(r: Outcome): EngineResult {
    this.state = r.state;
    this.pending.push(...r.events);
    return r.result;
  }

  tick(): EngineResult {
    return this.commit(tick(this.state));
  }

  tryMove(direction: MoveDirection): EngineResult {
    return this.commit(tryMove(this.state, direction));
  }

  tryRotate(direction: RotationDirection): EngineResult {
    return this.commit(tryRotate(this.state, direction));
  }

  hardDrop(): EngineResult {
    return this.commit(hardDrop(this.state));
  }

  dispatch(command: Command): EngineResult {
    return this.commit(applyCommand(this.state, command));
  }

  boardDimensions(): Readonly<{ height: number; width: number }> {
    return selectBoardDimensions(this.state);
  }

  // Visible rows only; row 0 is the top visible row
  cell(row: number, col: number): CellValue {
    return selectVisibleCell(this.state, row, col);
  }

  visibleRows(): ReadonlyArray<ReadonlyArray<CellValue>> {
    return selectVisibleRows(this.state);
  }

  currentScore(): number {
    return selectScore(this.state);
  }

  isGameOver(): boolean {
    return selectIsGameOver(this.state);
  }

  phase(): Phase {
    return selectPhase(this.state);
  }

  activePiece(): ActivePiece | undefined {
    return selectActive(this.state);
  }

  /** Current immutable snapshot; safe to keep */
  snapshot(): GameState {
    return this.state;
  }

  /** Events produced since the last drain, oldest first */
  drainEvents(): Array<DomainEvent> {
    const events = this.pending;
    this.pending = [];
    return events;
  }
}
