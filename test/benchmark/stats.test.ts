import { describe, it, expect } from "vitest";
import { calculateStats } from "../../src/benchmark/stats.js";

describe("calculateStats", () => {
  it("computes min, mean, max and population standard deviation", () => {
    const stats = calculateStats([1.0, 2.0, 3.0]);
    expect(stats.min).toBe(1);
    expect(stats.mean).toBe(2);
    expect(stats.max).toBe(3);
    expect(stats.stddev).toBe(Math.sqrt(2 / 3));
    expect(stats.stddev).toBeCloseTo(0.8165, 4);
  });

  it("divides by N, not N - 1", () => {
    // sample stddev of [2, 4] would be sqrt(2)
    expect(calculateStats([2, 4]).stddev).toBe(1);
  });

  it("returns zero deviation for identical samples", () => {
    expect(calculateStats([0.5, 0.5, 0.5, 0.5])).toEqual({ min: 0.5, mean: 0.5, max: 0.5, stddev: 0 });
  });

  it("handles a single sample", () => {
    expect(calculateStats([0.25])).toEqual({ min: 0.25, mean: 0.25, max: 0.25, stddev: 0 });
  });

  it("keeps mean between min and max", () => {
    const inputs = [
      [0.12, 0.5, 0.031],
      [3, 1, 4, 1, 5, 9, 2, 6],
      [0.0001, 10],
    ];
    for (const samples of inputs) {
      const stats = calculateStats(samples);
      expect(stats.min).toBeLessThanOrEqual(stats.mean);
      expect(stats.mean).toBeLessThanOrEqual(stats.max);
      expect(stats.stddev).toBeGreaterThanOrEqual(0);
    }
  });

  it("does not depend on sample order", () => {
    expect(calculateStats([3, 1, 2])).toEqual(calculateStats([1, 2, 3]));
  });

  it("handles runs far longer than the argument limit", () => {
    const samples = new Array<number>(500_000).fill(0.5);
    samples[123_456] = 0.25;
    samples[499_999] = 2;

    const stats = calculateStats(samples);
    expect(stats.min).toBe(0.25);
    expect(stats.max).toBe(2);
    expect(stats.stddev).toBeGreaterThan(0);
  });

  it("rejects an empty sample set", () => {
    expect(() => calculateStats([])).toThrow(RangeError);
  });
});
