import { assertBound, type RandomSource } from "./interface";

// Simple seedable RNG state
export type SeededRandomState = {
  seed: string;
  internalSeed: number;
};

// Create initial RNG state
export function createRandomState(seed = "default"): SeededRandomState {
  return {
    internalSeed: hashString(seed),
    seed,
  };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

export function nextInt(
  state: SeededRandomState,
  bound: number,
): { value: number; newState: SeededRandomState } {
  assertBound(bound);
  const internalSeed = nextRandom(state.internalSeed);
  // Use high bits mapped to [0, bound) to reduce modulo bias
  const value = Math.floor((internalSeed / 4294967296) * bound);
  return { newState: { ...state, internalSeed }, value };
}

/**
 * Wrapper class that implements RandomSource for SeededRandomState
 */
export class SeededRandom implements RandomSource {
  constructor(private readonly state: SeededRandomState) {}

  nextInt(bound: number): { value: number; newRng: RandomSource } {
    const result = nextInt(this.state, bound);
    return { newRng: new SeededRandom(result.newState), value: result.value };
  }

  getState(): SeededRandomState {
    return this.state;
  }
}

export function createSeededRandom(seed = "default"): RandomSource {
  return new SeededRandom(createRandomState(seed));
}
