export * from './domains/scoring';
export * from './domains/metrics';
export { getScoringConfig, resolveSchedulerStartupMode, ScoringConfigError, type ScoringConfig } from './config/scoring';
export { createCatalogLoader, createPgScoringRuntime } from './services/runtime';
export { recalculateScores, getScoreJobStatus } from './jobs/scoreRecompute.job';
