export interface BenchmarkStats {
  min: number;
  mean: number;
  max: number;
  /** Population standard deviation (divides by N). */
  stddev: number;
}

export function calculateStats(samples: readonly number[]): BenchmarkStats {
  if (samples.length === 0) {
    throw new RangeError("Cannot calculate statistics over zero samples");
  }

  const n = samples.length;
  // single pass; spreading into Math.min/max overflows the stack on long runs
  const totals = samples.reduce(
    (acc, t) => ({ min: Math.min(acc.min, t), max: Math.max(acc.max, t), sum: acc.sum + t }),
    { min: Infinity, max: -Infinity, sum: 0 },
  );
  const { min, max } = totals;
  const mean = totals.sum / n;
  const variance = samples.reduce((sum, t) => sum + (t - mean) ** 2, 0) / n;

  return { min, mean, max, stddev: Math.sqrt(variance) };
}
