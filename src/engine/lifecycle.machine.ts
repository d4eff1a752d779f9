/*
 * Piece lifecycle state machine (robot3).
 *
 * spawning → falling (SPAWNED) | gameOver (TOPPED_OUT)
 * falling → locking (LANDED)
 * locking → lineClearing (LOCKED)
 * lineClearing → spawning (CLEARED)
 * gameOver is final.
 *
 * The engine state stores only the phase name; each transition runs a
 * short-lived robot3 service started at that phase, so the transition
 * table here stays the single authority on legal moves.
 */

import { createMachine, interpret, state, transition } from "robot3";

import type { Phase } from "./types";
import type {
  Machine,
  MachineState,
  MachineStates,
  Transition,
} from "robot3";

export type LifecycleEvent =
  | { type: "SPAWNED" }
  | { type: "TOPPED_OUT" }
  | { type: "LANDED" }
  | { type: "LOCKED" }
  | { type: "CLEARED" };

type LifecycleEventType = LifecycleEvent["type"];
type LifecycleTransition = Transition<LifecycleEventType>;
type LifecycleContext = Readonly<Record<string, never>>;
type LifecycleStatesObject = Record<Phase, MachineState<LifecycleEventType>>;
export type LifecycleMachine = Machine<
  LifecycleStatesObject,
  LifecycleContext,
  Phase,
  LifecycleEventType
>;

const createSpawningState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(
    transition("SPAWNED", "falling"),
    transition("TOPPED_OUT", "gameOver"),
  );

const createFallingState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(transition("LANDED", "locking"));

const createLockingState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(transition("LOCKED", "lineClearing"));

const createLineClearingState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(transition("CLEARED", "spawning"));

const createGameOverState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>();

const STATES: LifecycleStatesObject = {
  falling: createFallingState(),
  gameOver: createGameOverState(),
  lineClearing: createLineClearingState(),
  locking: createLockingState(),
  spawning: createSpawningState(),
};

export const createLifecycleMachine = (
  initial: Phase = "spawning",
): LifecycleMachine =>
  // robot3's return type widens the state and event names to `string`;
  // cast back to keep Phase and LifecycleEventType at this module's edge.
  createMachine(
    initial,
    STATES as unknown as MachineStates<LifecycleStatesObject, LifecycleEventType>,
    (): LifecycleContext => ({}),
  ) as unknown as LifecycleMachine;

/**
 * Run one lifecycle event from `phase`. Throws when the event is not legal
 * there: that is an engine bug, not a player action.
 */
export function advancePhase(phase: Phase, event: LifecycleEvent): Phase {
  let next: Phase = phase;
  const service = interpret(createLifecycleMachine(phase), (s) => {
    next = s.machine.state.name;
  });
  service.send(event);
  if (next === phase) {
    throw new Error(
      `Illegal lifecycle event ${event.type} in phase ${phase}`,
    );
  }
  return next;
}

