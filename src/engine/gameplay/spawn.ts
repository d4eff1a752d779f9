import { debugLog, debugTable } from "../../utils/debug";
import { stampCells, visibleRows } from "../core/board";
import { occupiedCells } from "../core/piece";
import {
  nextKind,
  randomColor,
  randomInRange,
  randomRotation,
} from "../core/rng/randomizer";
import {
  canSpawn,
  createSpawnPiece,
  spawnColumnRange,
  spawnExtent,
} from "../core/spawning";
import { advancePhase } from "../lifecycle.machine";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";

/**
 * Single source of truth for spawning. Draws kind, rotation, color and
 * column, then either stamps the piece or ends the game when its cells are
 * already taken. A blocked spawn leaves the board untouched.
 */
export function spawnPiece(state: GameState): {
  state: GameState;
  events: Array<DomainEvent>;
} {
  const k = nextKind(state.randomizer);
  const kind = k.value;
  const r = randomRotation(k.randomizer, kind);
  const rotation = r.value;
  const c = randomColor(r.randomizer);

  const range = spawnColumnRange(state.board, spawnExtent(kind, rotation));
  if (range === null) {
    // Config validation guarantees every state fits
    throw new Error(
      `Unexpected: ${kind} rotation ${String(rotation)} does not fit the board`,
    );
  }
  const col = randomInRange(c.randomizer, range.min, range.max);

  const piece = createSpawnPiece({
    board: state.board,
    col: col.value,
    color: c.value,
    kind,
    rotation,
  });
  const drawn: GameState = { ...state, randomizer: col.randomizer };

  if (!canSpawn(state.board, piece)) {
    debugLog("engine", "top out", { col: col.value, kind, rotation });
    debugTable("engine", "board at top out", visibleRows(state.board));
    return {
      events: [{ kind: "TopOut", pieceKind: kind, tick: state.tick }],
      state: {
        ...drawn,
        phase: advancePhase(state.phase, { type: "TOPPED_OUT" }),
        piece: null,
      },
    };
  }

  debugLog("engine", "spawned", { col: col.value, kind, rotation });
  return {
    events: [
      {
        col: col.value,
        color: piece.color,
        kind: "PieceSpawned",
        pieceKind: kind,
        rotation,
        row: piece.row,
        tick: state.tick,
      },
    ],
    state: {
      ...drawn,
      board: stampCells(state.board, occupiedCells(piece), piece.color),
      phase: advancePhase(state.phase, { type: "SPAWNED" }),
      piece,
    },
  };
}
