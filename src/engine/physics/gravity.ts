import { tryMovePiece } from "../gameplay/movement";
import { settlePiece } from "../step/resolve-transitions";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";

/**
 * Count one tick toward the next gravity step. When the step is due the
 * counter restarts and the piece tries to fall one row; a piece that
 * cannot fall is settled (lock, clear, spawn).
 * `changed` is true only when the board or the active piece changed.
 */
export function gravityStep(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  changed: boolean;
} {
  if (state.phase !== "falling") return { changed: false, events: [], state };

  const counter = state.gravityCounter + 1;
  if (counter < state.gravityInterval) {
    return { changed: false, events: [], state: { ...state, gravityCounter: counter } };
  }

  const s: GameState = { ...state, gravityCounter: 0 };
  const fall = tryMovePiece(s, 1, 0);
  if (fall.moved) {
    return {
      changed: true,
      events: [
        {
          fromCol: fall.fromCol,
          fromRow: fall.fromRow,
          kind: "Moved",
          tick: s.tick,
          toCol: fall.toCol,
          toRow: fall.toRow,
        },
      ],
      state: fall.state,
    };
  }

  const settled = settlePiece(s, "gravity");
  return { changed: true, events: settled.events, state: settled.state };
}
