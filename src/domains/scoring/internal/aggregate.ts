export type WeightedInput = {
  score: number | undefined;
  weight: number;
};

export type WeightedMean = {
  value: number | null;
  totalWeight: number;
  included: number;
};

// Inputs without a score are left out of both sums rather than counted as zero.
export function weightedMean(inputs: readonly WeightedInput[]): WeightedMean {
  let weightedSum = 0;
  let totalWeight = 0;
  let included = 0;

  for (const input of inputs) {
    if (input.score === undefined) continue;
    weightedSum += input.score * input.weight;
    totalWeight += input.weight;
    included += 1;
  }

  if (totalWeight === 0) {
    return { value: null, totalWeight, included };
  }
  return { value: weightedSum / totalWeight, totalWeight, included };
}

export function percentChange(current: number, historical: number): number | null {
  if (historical === 0) return null;
  return ((current - historical) / historical) * 100;
}
