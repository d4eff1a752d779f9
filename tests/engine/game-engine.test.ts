import { SequenceRandom } from "@/engine/core/rng/sequence";
import { EngineConfigError } from "@/engine/errors";
import { GameEngine } from "@/engine/game-engine";

import { eventKinds } from "../test-helpers";

// O at column 0, color 1; later O picks need the reroll
const O_SCRIPT = [1, 0, 0, 0, 1, 1, 0, 0, 0, 1, 1, 0, 0, 0];

describe("GameEngine", () => {
  test("starts with a spawned piece above an empty visible area", () => {
    const engine = new GameEngine({}, { random: new SequenceRandom(O_SCRIPT) });
    expect(engine.boardDimensions()).toEqual({ height: 20, width: 10 });
    expect(engine.isGameOver()).toBe(false);
    expect(engine.phase()).toBe("falling");
    expect(engine.currentScore()).toBe(0);
    expect(engine.activePiece()).toMatchObject({ col: 0, kind: "O", row: 0 });

    const rows = engine.visibleRows();
    expect(rows).toHaveLength(20);
    expect(rows.every((r) => r.every((c) => c === 0))).toBe(true);
  });

  test("buffers events until drained", () => {
    const engine = new GameEngine({}, { random: new SequenceRandom(O_SCRIPT) });
    expect(eventKinds(engine.drainEvents())).toEqual(["PieceSpawned"]);
    expect(engine.drainEvents()).toEqual([]);

    engine.tryMove("right");
    engine.tryMove("down");
    expect(eventKinds(engine.drainEvents())).toEqual(["Moved", "Moved"]);
  });

  test("moves report changes", () => {
    const engine = new GameEngine({}, { random: new SequenceRandom(O_SCRIPT) });
    expect(engine.tryMove("left")).toEqual({ changed: false, kind: "ok" });
    expect(engine.tryMove("right")).toEqual({ changed: true, kind: "ok" });
    expect(engine.activePiece()?.col).toBe(1);
    expect(engine.tryRotate("CW")).toEqual({ changed: false, kind: "ok" });
    expect(engine.dispatch({ kind: "RotateCCW" })).toEqual({
      changed: false,
      kind: "ok",
    });
  });

  test("hard drop lands the piece in the visible area", () => {
    const engine = new GameEngine({}, { random: new SequenceRandom(O_SCRIPT) });
    expect(engine.hardDrop()).toEqual({ changed: true, kind: "ok" });
    expect(engine.cell(19, 0)).toBe(1);
    expect(engine.cell(18, 1)).toBe(1);
    expect(engine.cell(17, 0)).toBe(0);
  });

  test("tops out on a tiny board and stays over", () => {
    const engine = new GameEngine(
      { height: 2, width: 4 },
      { random: new SequenceRandom(O_SCRIPT) },
    );
    expect(engine.hardDrop()).toEqual({ changed: true, kind: "ok" });
    expect(engine.hardDrop()).toEqual({ kind: "gameOver" });
    expect(engine.isGameOver()).toBe(true);
    expect(engine.activePiece()).toBeUndefined();

    const snapshot = engine.snapshot();
    expect(engine.tick()).toEqual({ kind: "gameOver" });
    expect(engine.tryMove("left")).toEqual({ kind: "gameOver" });
    expect(engine.snapshot()).toBe(snapshot);
  });

  test("visible cell queries are range checked", () => {
    const engine = new GameEngine({}, { random: new SequenceRandom(O_SCRIPT) });
    expect(() => engine.cell(20, 0)).toThrow("out of range");
    expect(() => engine.cell(-1, 0)).toThrow("out of range");
  });

  test("a config the board cannot host is rejected", () => {
    expect(() => new GameEngine({ width: 3 })).toThrow(EngineConfigError);
  });

  test("ticks drive gravity", () => {
    const engine = new GameEngine(
      { gravitySeconds: 0.5, ticksPerSecond: 4 },
      { random: new SequenceRandom(O_SCRIPT) },
    );
    expect(engine.tick()).toEqual({ changed: false, kind: "ok" });
    expect(engine.tick()).toEqual({ changed: true, kind: "ok" });
    expect(engine.activePiece()?.row).toBe(1);
  });
});
