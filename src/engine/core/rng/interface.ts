/**
 * Source of uniform random integers.
 * This allows us to have different implementations for production and testing.
 */
export type RandomSource = {
  /**
   * Draw an integer uniformly from [0, bound).
   * Returns the value and a new source state (immutable pattern)
   */
  nextInt(bound: number): {
    value: number;
    newRng: RandomSource;
  };
};

export function assertBound(bound: number): void {
  if (!Number.isInteger(bound) || bound < 1) {
    throw new Error(
      `Random bound must be a positive integer, got ${String(bound)}`,
    );
  }
}
