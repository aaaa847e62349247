import { v4 as uuidv4 } from 'uuid';
import { database, type Queryable } from '../db';
import { wrapStoreCall } from '../domains/scoring/errors';
import type { ScoreRunLog, ScoreRunSummary } from '../domains/scoring/stores';

/**
 * Run log for recompute passes, one row per pass in score_runs, plus the
 * meta_config bookkeeping keys read by the API.
 */
export class PgScoreRunLog implements ScoreRunLog {
  constructor(private readonly db: Queryable = database) {}

  async start(asOf: number, notes?: string): Promise<string> {
    const runId = uuidv4();
    await wrapStoreCall('scoreRuns.start', () =>
      this.db.query(
        `INSERT INTO score_runs (id, status, as_of, notes, started_at)
         VALUES ($1, 'running', $2, $3, now())`,
        [runId, asOf, notes ?? null]
      )
    );
    return runId;
  }

  async complete(runId: string, summary: ScoreRunSummary): Promise<void> {
    await wrapStoreCall('scoreRuns.complete', () =>
      this.db.query(
        `UPDATE score_runs
            SET status = 'completed',
                metrics_scored = $2,
                metrics_omitted = $3,
                pillars_scored = $4,
                overall_score = $5,
                finished_at = now()
          WHERE id = $1`,
        [runId, summary.metricsScored, summary.metricsOmitted, summary.pillarsScored, summary.overallScore]
      )
    );
  }

  async fail(runId: string, message: string): Promise<void> {
    await wrapStoreCall('scoreRuns.fail', () =>
      this.db.query(
        `UPDATE score_runs
            SET status = 'failed',
                error_message = $2,
                finished_at = now()
          WHERE id = $1`,
        [runId, message]
      )
    );
  }

  async setMeta(key: string, value: string): Promise<void> {
    await wrapStoreCall('meta.set', () =>
      this.db.query(
        `INSERT INTO meta_config (key, value, updated_at)
         VALUES ($1, $2, now())
         ON CONFLICT (key)
         DO UPDATE SET value = EXCLUDED.value, updated_at = now()`,
        [key, value]
      )
    );
  }
}
