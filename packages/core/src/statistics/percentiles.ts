export interface LatencySummary {
  count: number;
  mean: number;
  min: number;
  max: number;
  p50: number;
  p95: number;
  p99: number;
}

/**
 * Percentile with linear interpolation between the two closest ranks
 * (rank = p/100 * (n - 1)), so p50 of [100, 200, 300, 400] is 250.
 */
export function percentile(samples: readonly number[], p: number): number {
  if (samples.length === 0) {
    throw new Error("percentile of an empty sample set");
  }
  if (p < 0 || p > 100) {
    throw new Error(`percentile must be within [0, 100], got ${p}`);
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const low = sorted[lower] ?? 0;
  const high = sorted[upper] ?? low;
  return low + (high - low) * (rank - lower);
}

export function summarizeLatencies(samples: readonly number[]): LatencySummary | null {
  if (samples.length === 0) {
    return null;
  }

  let total = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of samples) {
    total += value;
    min = Math.min(min, value);
    max = Math.max(max, value);
  }

  return {
    count: samples.length,
    mean: total / samples.length,
    min,
    max,
    p50: percentile(samples, 50),
    p95: percentile(samples, 95),
    p99: percentile(samples, 99)
  };
}
