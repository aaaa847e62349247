import type { PercentileSummary } from '../types';

/**
 * Linear-interpolation percentile of an ascending sample:
 * rank i = (n - 1) * p / 100, interpolated between the floor and ceil order statistics.
 */
export function percentileOfSorted(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new RangeError('percentile of an empty sample is undefined');
  }
  const index = ((sorted.length - 1) * p) / 100;
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const lowerValue = sorted[lower];
  const upperValue = sorted[upper];
  if (lowerValue === undefined || upperValue === undefined) {
    throw new RangeError(`percentile ${p} is outside 0..100`);
  }
  return lowerValue + (upperValue - lowerValue) * (index - lower);
}

export function summarizeDistribution(values: readonly number[]): PercentileSummary {
  const sorted = [...values].sort((a, b) => a - b);
  return {
    p10: percentileOfSorted(sorted, 10),
    p25: percentileOfSorted(sorted, 25),
    p50: percentileOfSorted(sorted, 50),
    p75: percentileOfSorted(sorted, 75),
    p90: percentileOfSorted(sorted, 90),
    min: percentileOfSorted(sorted, 0),
    max: percentileOfSorted(sorted, 100)
  };
}

type Breakpoint = { value: number; rank: number };

function breakpointsOf(summary: PercentileSummary): Breakpoint[] {
  return [
    { value: summary.min, rank: 0 },
    { value: summary.p10, rank: 0.1 },
    { value: summary.p25, rank: 0.25 },
    { value: summary.p50, rank: 0.5 },
    { value: summary.p75, rank: 0.75 },
    { value: summary.p90, rank: 0.9 },
    { value: summary.max, rank: 1 }
  ];
}

/**
 * Piecewise-linear percentile rank in [0, 1] across the seven stored breakpoints.
 * Zero-width segments resolve to their lower rank bound.
 */
export function rankWithinSummary(summary: PercentileSummary, value: number): number {
  if (value <= summary.min) return 0;
  if (value >= summary.max) return 1;

  const points = breakpointsOf(summary);
  for (let i = 1; i < points.length; i += 1) {
    const lo = points[i - 1];
    const hi = points[i];
    if (!lo || !hi || value > hi.value) continue;
    const span = hi.value - lo.value;
    if (span <= 0) return lo.rank;
    return lo.rank + ((hi.rank - lo.rank) * (value - lo.value)) / span;
  }
  return 1;
}
