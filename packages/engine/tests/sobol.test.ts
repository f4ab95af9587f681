import { describe, expect, it } from "vitest";
import { SobolSequence, defaultSequence } from "../src/sequence/sobol";

function take(seq: { next(): number }, count: number): number[] {
  return Array.from({ length: count }, () => seq.next());
}

describe("SobolSequence", () => {
  it("produces the first Sobol dimension in Gray-code order, skipping 0", () => {
    expect(take(new SobolSequence(), 8)).toEqual([
      0.5, 0.75, 0.25, 0.375, 0.875, 0.625, 0.125, 0.1875
    ]);
  });

  it("covers every multiple of 2^-m once within the first 2^m - 1 values", () => {
    const values = take(new SobolSequence(), 1023);
    const sorted = [...values].sort((a, b) => a - b);

    expect(new Set(values).size).toBe(1023);
    expect(sorted).toEqual(Array.from({ length: 1023 }, (_, i) => (i + 1) / 1024));
  });

  it("restarts for every instance from the default factory", () => {
    const a = defaultSequence();
    const b = defaultSequence();
    take(a, 100);

    expect(a).not.toBe(b);
    expect(b.next()).toBe(0.5);
    expect(take(defaultSequence(), 50)).toEqual(take(new SobolSequence(), 50));
  });
});
