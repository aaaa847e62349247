import type { DefinitionCatalog } from './catalog';
import { Normalizer, type NormalizationSummary, type NormalizerOptions } from './normalizer';
import { ScoreEngine, type ScorePassResult } from './scoreEngine';
import type { MeasurementStore, PercentileStore, ScoreRunLog, ScoreStore } from './stores';
import { toUnixSeconds, type ScoringLogger } from './types';

export type ScoringRuntime = {
  measurements: MeasurementStore;
  percentiles: PercentileStore;
  scores: ScoreStore;
  runs: ScoreRunLog;
  loadCatalog: () => Promise<DefinitionCatalog>;
  normalizerOptions?: Partial<NormalizerOptions>;
  logger?: ScoringLogger;
};

export type ScoringPassOptions = {
  asOf?: number;
  notes?: string;
};

export type ScoringPassSummary = {
  runId: string;
  asOf: number;
  normalization: NormalizationSummary;
  scores: ScorePassResult;
  durationMs: number;
};

/**
 * One recompute pass: refresh percentile snapshots, then score every metric,
 * pillar and the overall score against those snapshots. Store failures abort
 * the pass and are rethrown after the run is marked failed.
 */
export async function runScoringPass(
  runtime: ScoringRuntime,
  options: ScoringPassOptions = {}
): Promise<ScoringPassSummary> {
  const logger = runtime.logger ?? console;
  const asOf = options.asOf ?? toUnixSeconds(new Date());
  const startedAt = Date.now();
  const runId = await runtime.runs.start(asOf, options.notes);

  try {
    const catalog = await runtime.loadCatalog();
    const normalizer = new Normalizer(runtime.measurements, runtime.percentiles, runtime.normalizerOptions, logger);

    const normalization = await normalizer.normalizeAll(asOf);
    await runtime.runs.setMeta('last_normalization', new Date(asOf * 1000).toISOString());

    const engine = new ScoreEngine({
      catalog,
      normalizer,
      measurements: runtime.measurements,
      scores: runtime.scores,
      logger
    });
    const scores = await engine.computeAll({ asOf });

    await runtime.runs.complete(runId, {
      metricsScored: scores.metricScores.size,
      metricsOmitted: scores.omissions.filter((omission) => omission.kind === 'metric').length,
      pillarsScored: scores.pillarScores.size,
      overallScore: scores.overallScore
    });
    await runtime.runs.setMeta('last_computation', new Date(asOf * 1000).toISOString());

    return { runId, asOf, normalization, scores, durationMs: Date.now() - startedAt };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    try {
      await runtime.runs.fail(runId, message);
    } catch (failErr) {
      logger.error('Unable to mark score run as failed', {
        runId,
        error: failErr instanceof Error ? failErr.message : String(failErr)
      });
    }
    throw err;
  }
}
