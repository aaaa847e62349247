export {
  DefinitionCatalog,
  DEFAULT_METRIC_WEIGHT,
  loadCatalogFile,
  loadCatalogFromSource
} from './catalog';

export { CatalogValidationError, StoreError, wrapStoreCall } from './errors';

export {
  Normalizer,
  DEFAULT_NORMALIZER_OPTIONS,
  type NormalizationSummary,
  type NormalizerOptions,
  type RankedValue
} from './normalizer';

export {
  ScoreEngine,
  scoreTargetBand,
  TREND_7D_DAYS,
  TREND_30D_DAYS,
  type ScoreEngineDeps,
  type ScoreOmission,
  type ScorePassResult,
  type TrendOptions
} from './scoreEngine';

export {
  runScoringPass,
  type ScoringPassOptions,
  type ScoringPassSummary,
  type ScoringRuntime
} from './pass';

export { percentileOfSorted, rankWithinSummary, summarizeDistribution } from './internal/percentiles';

export type {
  DefinitionSource,
  MeasurementStore,
  PercentileStore,
  ScoreRunLog,
  ScoreRunStatus,
  ScoreRunSummary,
  ScoreStore
} from './stores';

export * from './types';
