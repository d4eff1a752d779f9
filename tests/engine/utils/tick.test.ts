// Tests for @/engine/utils/tick.ts
import { asTick, incrementTick } from "@/engine/utils/tick";

describe("@/engine/utils/tick — branded tick counter", () => {
  test("incrementTick(t) returns t+1 as Tick", () => {
    const result = incrementTick(asTick(100));
    expect(result).toBe(101);
  });

  test("asTick accepts zero", () => {
    expect(asTick(0)).toBe(0);
  });

  test.each([-1, 1.5, Number.NaN])("asTick rejects %p", (n) => {
    expect(() => asTick(n)).toThrow("Tick must be a non-negative integer");
  });
});
