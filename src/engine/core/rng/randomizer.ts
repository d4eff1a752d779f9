import { KIND_COUNT, kindAt, kindIndex, rotationStateCount } from "../pieces";
import {
  type ColorTag,
  type PieceKind,
  COLOR_COUNT,
  createColorTag,
} from "../types";

import { type RandomSource } from "./interface";

export type Randomizer = {
  readonly rng: RandomSource;
  readonly previousKind: PieceKind | null;
};

type Draw<T> = { value: T; randomizer: Randomizer };

export function createRandomizer(rng: RandomSource): Randomizer {
  return { previousKind: null, rng };
}

function draw(randomizer: Randomizer, bound: number): Draw<number> {
  const r = randomizer.rng.nextInt(bound);
  return { randomizer: { ...randomizer, rng: r.newRng }, value: r.value };
}

/**
 * NES-style pick: draw from K kinds plus one reroll slot. Landing on the
 * reroll slot or on the previous kind triggers a single redraw over the K
 * kinds, which is kept whatever it is.
 */
export function nextKind(randomizer: Randomizer): Draw<PieceKind> {
  const first = draw(randomizer, KIND_COUNT + 1);
  let index = first.value;
  let next = first.randomizer;

  const previous =
    randomizer.previousKind === null ? -1 : kindIndex(randomizer.previousKind);
  if (index === KIND_COUNT || index === previous) {
    const second = draw(next, KIND_COUNT);
    index = second.value;
    next = second.randomizer;
  }

  const kind = kindAt(index);
  return { randomizer: { ...next, previousKind: kind }, value: kind };
}

export function randomRotation(
  randomizer: Randomizer,
  kind: PieceKind,
): Draw<number> {
  return draw(randomizer, rotationStateCount(kind));
}

export function randomColor(randomizer: Randomizer): Draw<ColorTag> {
  const d = draw(randomizer, COLOR_COUNT);
  return { randomizer: d.randomizer, value: createColorTag(d.value + 1) };
}

// Uniform integer in [min, max]
export function randomInRange(
  randomizer: Randomizer,
  min: number,
  max: number,
): Draw<number> {
  if (max < min) {
    throw new Error(
      `Empty range [${String(min)}, ${String(max)}]`,
    );
  }
  const d = draw(randomizer, max - min + 1);
  return { randomizer: d.randomizer, value: min + d.value };
}
