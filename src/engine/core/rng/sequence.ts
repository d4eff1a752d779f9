import { assertBound, type RandomSource } from "./interface";

/**
 * Source that yields a fixed sequence of draws and then repeats.
 * Each call returns a new instance with advanced index (immutable style).
 * A scripted value that does not fit the requested bound is a test bug.
 */
export class SequenceRandom implements RandomSource {
  constructor(
    private readonly sequence: ReadonlyArray<number>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
  }

  nextInt(bound: number): { value: number; newRng: RandomSource } {
    assertBound(bound);
    const value = this.sequence[this.index];
    if (value === undefined) throw new Error("Sequence index out of bounds");
    if (!Number.isInteger(value) || value < 0 || value >= bound) {
      throw new Error(
        `Scripted draw ${String(value)} at index ${String(this.index)} does not fit bound ${String(bound)}`,
      );
    }
    const nextIndex = (this.index + 1) % this.sequence.length;
    return { newRng: new SequenceRandom(this.sequence, nextIndex), value };
  }
}
