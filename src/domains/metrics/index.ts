export {
  DERIVED_METRIC_IDS,
  DerivedMetricsRecorder,
  type Concentration,
  type LightningSnapshot
} from './derivedMetrics';

export {
  alignNearest,
  difficultyMomentum,
  feeElasticity,
  feeShare,
  giniCoefficient,
  growthRate,
  hashprice,
  herfindahlIndex,
  MIN_ELASTICITY_PAIRS,
  normalizedEntropy,
  pearsonCorrelation,
  ratio,
  topShare,
  type HashpriceInput
} from './formulas';
