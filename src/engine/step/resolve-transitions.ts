import { debugLog } from "../../utils/debug";
import { spawnPiece } from "../gameplay/spawn";
import { advancePhase } from "../lifecycle.machine";
import { clearCompletedRows } from "../scoring/line-clear";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";

/**
 * The piece could not move down: lock it, clear rows, spawn the next one.
 * Locking writes nothing; the piece's cells are already on the board.
 */
export function settlePiece(
  state: GameState,
  source: "gravity" | "hardDrop",
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  const piece = state.piece;
  if (!piece || state.phase !== "falling") {
    return { events: [], state };
  }

  const events: Array<DomainEvent> = [];
  let s: GameState = {
    ...state,
    phase: advancePhase(state.phase, { type: "LANDED" }),
  };

  // 1) Lock
  s = { ...s, phase: advancePhase(s.phase, { type: "LOCKED" }), piece: null };
  events.push({ kind: "Locked", pieceKind: piece.kind, source, tick: s.tick });
  debugLog("engine", "locked", { kind: piece.kind, source });

  // 2) Clear the rows the piece spans
  const cleared = clearCompletedRows(s.board, piece);
  s = {
    ...s,
    board: cleared.board,
    phase: advancePhase(s.phase, { type: "CLEARED" }),
    score: s.score + cleared.rows.length,
  };
  if (cleared.rows.length > 0) {
    debugLog("engine", "lines cleared", cleared.rows);
    events.push({ kind: "LinesCleared", rows: cleared.rows, tick: s.tick });
  }

  // 3) Spawn
  const sp = spawnPiece(s);
  events.push(...sp.events);

  return { events, state: sp.state };
}
