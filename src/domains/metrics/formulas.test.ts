import { describe, expect, it } from 'vitest';
import {
  alignNearest,
  difficultyMomentum,
  feeElasticity,
  feeShare,
  giniCoefficient,
  growthRate,
  hashprice,
  herfindahlIndex,
  normalizedEntropy,
  pearsonCorrelation,
  ratio,
  topShare
} from './formulas';

describe('concentration formulas', () => {
  it('computes HHI from percentage shares', () => {
    expect(herfindahlIndex([30, 25, 20, 15, 10])).toBeCloseTo(0.225, 10);
  });

  it('gives the same HHI for counts and fractions', () => {
    expect(herfindahlIndex([3, 1])).toBeCloseTo(herfindahlIndex([0.75, 0.25]) ?? NaN, 10);
    expect(herfindahlIndex([3, 1])).toBeCloseTo(0.625, 10);
  });

  it('has no HHI without positive shares', () => {
    expect(herfindahlIndex([])).toBeNull();
    expect(herfindahlIndex([0, 0])).toBeNull();
  });

  it('sums the largest shares', () => {
    expect(topShare([10, 30, 15, 25, 20])).toBeCloseTo(0.75, 10);
    expect(topShare([50, 50], 3)).toBeCloseTo(1, 10);
  });

  it('normalizes entropy to 0..1', () => {
    expect(normalizedEntropy([10])).toBe(0);
    expect(normalizedEntropy([5, 5, 5, 5])).toBeCloseTo(1, 10);
    const skewed = normalizedEntropy([90, 5, 5]);
    expect(skewed).not.toBeNull();
    expect(skewed ?? 1).toBeLessThan(0.5);
  });

  it('measures inequality with the Gini coefficient', () => {
    expect(giniCoefficient([5, 5, 5, 5])).toBeCloseTo(0, 10);
    expect(giniCoefficient([0, 0, 0, 10])).toBeCloseTo(0.75, 10);
    expect(giniCoefficient([])).toBeNull();
  });
});

describe('economic formulas', () => {
  it('computes hashprice in USD per TH per day', () => {
    const difficulty = 600 / 2 ** 32; // one hash per second network-wide
    const value = hashprice({ difficulty, avgFeesPerBlock: 0.5, subsidyPerBlock: 0.5, priceUsd: 1 });
    // 144 blocks * 1 BTC * $1 over 86400 hashes, scaled to a terahash
    expect(value).toBeCloseTo((144 / 86_400) * 1e12, 0);
  });

  it('has no hashprice without difficulty', () => {
    expect(hashprice({ difficulty: 0, avgFeesPerBlock: 1, subsidyPerBlock: 3.125, priceUsd: 60_000 })).toBeNull();
  });

  it('computes fee share and ratios', () => {
    expect(feeShare(1, 3)).toBeCloseTo(0.25, 10);
    expect(feeShare(0, 0)).toBeNull();
    expect(ratio(3, 4)).toBeCloseTo(0.75, 10);
    expect(ratio(1, 0)).toBeNull();
  });

  it('computes growth against a positive baseline only', () => {
    expect(growthRate(110, 100)).toBeCloseTo(0.1, 10);
    expect(growthRate(110, 0)).toBeNull();
  });

  it('buckets the difficulty change', () => {
    expect(difficultyMomentum(-4.9)).toBe(1);
    expect(difficultyMomentum(5)).toBe(0.75);
    expect(difficultyMomentum(-12)).toBe(0.5);
    expect(difficultyMomentum(39.9)).toBe(0.25);
    expect(difficultyMomentum(40)).toBe(0);
  });
});

describe('fee elasticity', () => {
  const hour = 3600;

  it('correlates linearly related series', () => {
    expect(pearsonCorrelation([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(pearsonCorrelation([1, 2, 3], [6, 4, 2])).toBeCloseTo(-1, 10);
    expect(pearsonCorrelation([1, 1, 1], [1, 2, 3])).toBeNull();
    expect(pearsonCorrelation([1], [1])).toBeNull();
  });

  it('pairs points within the tolerance', () => {
    const pairs = alignNearest(
      [
        { ts: 0, value: 1 },
        { ts: 10 * hour, value: 2 }
      ],
      [
        { ts: 600, value: 10 },
        { ts: 5 * hour, value: 20 }
      ]
    );
    expect(pairs).toEqual([[1, 10]]);
  });

  it('needs more than ten aligned samples', () => {
    const sizes = Array.from({ length: 10 }, (_, index) => ({ ts: index * hour, value: index + 1 }));
    const fees = sizes.map((point) => ({ ts: point.ts + 60, value: point.value * 2 }));
    expect(feeElasticity(sizes, fees)).toBeNull();

    const more = [...sizes, { ts: 10 * hour, value: 11 }];
    const moreFees = more.map((point) => ({ ts: point.ts + 60, value: point.value * 2 }));
    expect(feeElasticity(more, moreFees)).toBeCloseTo(1, 10);
  });
});
