import { describe, expect, it } from 'vitest';
import { percentileOfSorted, rankWithinSummary, summarizeDistribution } from './percentiles';

const oneToHundred = Array.from({ length: 100 }, (_, index) => index + 1);

describe('summarizeDistribution', () => {
  it('interpolates linearly between order statistics', () => {
    const summary = summarizeDistribution(oneToHundred);

    expect(summary.p10).toBeCloseTo(10.9, 10);
    expect(summary.p25).toBeCloseTo(25.75, 10);
    expect(summary.p50).toBeCloseTo(50.5, 10);
    expect(summary.p75).toBeCloseTo(75.25, 10);
    expect(summary.p90).toBeCloseTo(90.1, 10);
    expect(summary.min).toBe(1);
    expect(summary.max).toBe(100);
  });

  it('does not depend on input order', () => {
    const shuffled = [...oneToHundred].reverse();
    expect(summarizeDistribution(shuffled)).toEqual(summarizeDistribution(oneToHundred));
  });

  it('collapses to the single value for a one-point sample', () => {
    expect(summarizeDistribution([7])).toEqual({ p10: 7, p25: 7, p50: 7, p75: 7, p90: 7, min: 7, max: 7 });
  });

  it('rejects an empty sample', () => {
    expect(() => percentileOfSorted([], 50)).toThrow(RangeError);
  });
});

describe('rankWithinSummary', () => {
  const summary = summarizeDistribution(oneToHundred);

  it('pins the distribution endpoints to 0 and 1', () => {
    expect(rankWithinSummary(summary, summary.min)).toBe(0);
    expect(rankWithinSummary(summary, summary.max)).toBe(1);
    expect(rankWithinSummary(summary, -5)).toBe(0);
    expect(rankWithinSummary(summary, 500)).toBe(1);
  });

  it('hits the breakpoint ranks exactly', () => {
    expect(rankWithinSummary(summary, summary.p10)).toBeCloseTo(0.1, 10);
    expect(rankWithinSummary(summary, summary.p50)).toBeCloseTo(0.5, 10);
    expect(rankWithinSummary(summary, summary.p90)).toBeCloseTo(0.9, 10);
  });

  it('interpolates inside a segment', () => {
    // p25 = 25.75, p50 = 50.5: 30.7 sits a fifth of the way along
    expect(rankWithinSummary(summary, 30.7)).toBeCloseTo(0.3, 10);
  });

  it('is monotonic non-decreasing', () => {
    let previous = -1;
    for (let value = 0; value <= 101; value += 0.5) {
      const rank = rankWithinSummary(summary, value);
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });

  it('stays finite when adjacent breakpoints are equal', () => {
    const flat = { min: 0, p10: 5, p25: 5, p50: 5, p75: 5, p90: 5, max: 10 };

    expect(rankWithinSummary(flat, 5)).toBeCloseTo(0.1, 10);
    expect(rankWithinSummary(flat, 7)).toBeCloseTo(0.94, 10);
    for (let value = 0; value <= 10; value += 0.25) {
      const rank = rankWithinSummary(flat, value);
      expect(Number.isFinite(rank)).toBe(true);
      expect(rank).toBeGreaterThanOrEqual(0);
      expect(rank).toBeLessThanOrEqual(1);
    }
  });

  it('returns 0 for a degenerate distribution', () => {
    const constant = summarizeDistribution([4, 4, 4]);
    expect(rankWithinSummary(constant, 4)).toBe(0);
    expect(rankWithinSummary(constant, 4.1)).toBe(1);
  });
});
