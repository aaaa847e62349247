import { getScoringConfig } from '../config/scoring';
import { runScoringPass, type ScoringPassSummary, type ScoringRuntime } from '../domains/scoring/pass';
import { roundTo } from '../lib/numbers';
import { createPgScoringRuntime } from '../services/runtime';

/**
 * In-memory job lock. Only one recompute pass runs per process; deployments
 * with several workers must leave the scheduler enabled on exactly one.
 */
let isRunning = false;
let lastRunTime: Date | null = null;
let lastRunDuration: number | null = null;
let lastRunId: string | null = null;
let lastError: string | null = null;

let defaultRuntime: ScoringRuntime | null = null;

function getDefaultRuntime(): ScoringRuntime {
  if (!defaultRuntime) {
    defaultRuntime = createPgScoringRuntime(getScoringConfig());
  }
  return defaultRuntime;
}

/**
 * Score recompute job
 *
 * 1. Refresh percentile snapshots for every metric with measurements
 * 2. Score metrics, pillars and the overall score with 7d/30d trends
 * 3. Persist the records and the run log entry
 *
 * Returns null when a pass is already in flight.
 */
export async function recalculateScores(
  runtime: ScoringRuntime = getDefaultRuntime(),
  options: { asOf?: number; notes?: string } = {}
): Promise<ScoringPassSummary | null> {
  if (isRunning) {
    console.warn('⚠️  Score recompute already running, skipping');
    return null;
  }

  isRunning = true;
  const startTime = Date.now();

  try {
    console.log('📊 Starting score recompute');
    const summary = await runScoringPass(runtime, {
      asOf: options.asOf,
      notes: options.notes ?? 'Automatic score recompute'
    });

    const { normalization, scores } = summary;
    console.log(`   Percentiles: ${normalization.computed.length} computed, ${normalization.skipped.length} skipped`);
    console.log(`   Metrics: ${scores.metricScores.size} scored, ${scores.omissions.length} omission(s)`);
    console.log(`   Pillars: ${scores.pillarScores.size} scored`);
    console.log(
      `   Overall: ${scores.overallScore === null ? 'unavailable' : roundTo(scores.overallScore, 1)}`
    );

    lastRunTime = new Date();
    lastRunDuration = Date.now() - startTime;
    lastRunId = summary.runId;
    lastError = null;

    console.log(`✅ Score recompute completed in ${lastRunDuration}ms (run ${summary.runId})`);
    return summary;
  } catch (error) {
    lastError = error instanceof Error ? error.message : String(error);
    console.error('❌ Score recompute failed:', error);
    throw error;
  } finally {
    isRunning = false;
  }
}

export function getScoreJobStatus() {
  return {
    isRunning,
    lastRunTime: lastRunTime?.toISOString() ?? null,
    lastRunDuration,
    lastRunId,
    lastError
  };
}
