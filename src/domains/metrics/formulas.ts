import type { MeasurementPoint } from '../scoring/types';

const SECONDS_PER_BLOCK_TARGET = 600;
const BLOCKS_PER_DAY = 144;
const HASHES_PER_TERAHASH = 1e12;

function normalizeShares(shares: readonly number[]): number[] | null {
  const positive = shares.filter((share) => Number.isFinite(share) && share > 0);
  const total = positive.reduce((sum, share) => sum + share, 0);
  if (total <= 0) return null;
  return positive.map((share) => share / total);
}

/**
 * Herfindahl-Hirschman index. Shares may be given in any unit (percent, block
 * counts); they are normalized to fractions of their total first.
 */
export function herfindahlIndex(shares: readonly number[]): number | null {
  const fractions = normalizeShares(shares);
  if (!fractions) return null;
  return fractions.reduce((sum, fraction) => sum + fraction * fraction, 0);
}

export function topShare(shares: readonly number[], count = 3): number | null {
  const fractions = normalizeShares(shares);
  if (!fractions) return null;
  return [...fractions]
    .sort((a, b) => b - a)
    .slice(0, count)
    .reduce((sum, fraction) => sum + fraction, 0);
}

/**
 * Shannon entropy of a distribution divided by its maximum (ln n), so a single
 * participant scores 0 and a uniform spread scores 1.
 */
export function normalizedEntropy(counts: readonly number[]): number | null {
  const fractions = normalizeShares(counts);
  if (!fractions) return null;
  if (fractions.length === 1) return 0;
  const entropy = fractions.reduce((sum, p) => sum - p * Math.log(p), 0);
  return entropy / Math.log(fractions.length);
}

export function giniCoefficient(values: readonly number[]): number | null {
  const sorted = values.filter((value) => Number.isFinite(value) && value >= 0).sort((a, b) => a - b);
  const n = sorted.length;
  const total = sorted.reduce((sum, value) => sum + value, 0);
  if (n === 0 || total === 0) return null;
  const weighted = sorted.reduce((sum, value, index) => sum + (index + 1) * value, 0);
  return (2 * weighted) / (n * total) - (n + 1) / n;
}

export type HashpriceInput = {
  difficulty: number;
  avgFeesPerBlock: number;
  subsidyPerBlock: number;
  priceUsd: number;
};

/** Miner revenue in USD per terahash per day. */
export function hashprice(input: HashpriceInput): number | null {
  if (input.difficulty <= 0) return null;
  const hashesPerSecond = (input.difficulty * 2 ** 32) / SECONDS_PER_BLOCK_TARGET;
  const dailyHashes = hashesPerSecond * 86_400;
  const dailyRevenueUsd = BLOCKS_PER_DAY * (input.avgFeesPerBlock + input.subsidyPerBlock) * input.priceUsd;
  return (dailyRevenueUsd / dailyHashes) * HASHES_PER_TERAHASH;
}

export function feeShare(totalFees: number, totalSubsidy: number): number | null {
  const revenue = totalFees + totalSubsidy;
  if (revenue <= 0) return null;
  return totalFees / revenue;
}

export function ratio(part: number, total: number): number | null {
  if (total <= 0) return null;
  return part / total;
}

export function growthRate(current: number, previous: number): number | null {
  if (previous <= 0) return null;
  return (current - previous) / previous;
}

/** Maps the estimated difficulty change (percent) onto a stability score in [0, 1]. */
export function difficultyMomentum(estimatedChangePct: number): number {
  const change = Math.abs(estimatedChangePct);
  if (change < 5) return 1;
  if (change < 10) return 0.75;
  if (change < 20) return 0.5;
  if (change < 40) return 0.25;
  return 0;
}

export function pearsonCorrelation(xs: readonly number[], ys: readonly number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;
  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i += 1) {
    sumX += xs[i] ?? 0;
    sumY += ys[i] ?? 0;
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < n; i += 1) {
    const dx = (xs[i] ?? 0) - meanX;
    const dy = (ys[i] ?? 0) - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }
  if (varianceX === 0 || varianceY === 0) return null;
  return covariance / Math.sqrt(varianceX * varianceY);
}

/**
 * Pairs each point of `primary` with the nearest-in-time point of `secondary`,
 * dropping pairs further apart than `toleranceSeconds`.
 */
export function alignNearest(
  primary: readonly MeasurementPoint[],
  secondary: readonly MeasurementPoint[],
  toleranceSeconds = 3600
): Array<[number, number]> {
  if (secondary.length === 0) return [];
  const pairs: Array<[number, number]> = [];
  for (const point of primary) {
    let closest: MeasurementPoint | undefined;
    for (const candidate of secondary) {
      if (!closest || Math.abs(candidate.ts - point.ts) < Math.abs(closest.ts - point.ts)) {
        closest = candidate;
      }
    }
    if (closest && Math.abs(closest.ts - point.ts) < toleranceSeconds) {
      pairs.push([point.value, closest.value]);
    }
  }
  return pairs;
}

export const MIN_ELASTICITY_PAIRS = 10;

/** Correlation between mempool size and fee rate; needs more than ten aligned samples. */
export function feeElasticity(
  mempoolSizes: readonly MeasurementPoint[],
  feeRates: readonly MeasurementPoint[]
): number | null {
  if (mempoolSizes.length <= MIN_ELASTICITY_PAIRS || feeRates.length <= MIN_ELASTICITY_PAIRS) return null;
  const pairs = alignNearest(mempoolSizes, feeRates);
  if (pairs.length <= MIN_ELASTICITY_PAIRS) return null;
  return pearsonCorrelation(
    pairs.map(([size]) => size),
    pairs.map(([, fee]) => fee)
  );
}
