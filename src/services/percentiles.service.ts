import { database, type Queryable } from '../db';
import { wrapStoreCall } from '../domains/scoring/errors';
import type { PercentileStore } from '../domains/scoring/stores';
import type { PercentileSnapshot } from '../domains/scoring/types';
import { toNumber } from '../lib/numbers';

type PercentileRow = {
  metric_id: string;
  window_days: number;
  ts: number | string;
  p10: number;
  p25: number;
  p50: number;
  p75: number;
  p90: number;
  min_val: number;
  max_val: number;
};

// Snapshots are kept per (metric, window, ts) so older distributions stay auditable.
export class PgPercentileStore implements PercentileStore {
  constructor(private readonly db: Queryable = database) {}

  async upsert(snapshot: PercentileSnapshot): Promise<void> {
    await wrapStoreCall('percentiles.upsert', () =>
      this.db.query(
        `INSERT INTO percentile_snapshots
           (metric_id, window_days, ts, p10, p25, p50, p75, p90, min_val, max_val)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (metric_id, window_days, ts)
         DO UPDATE SET p10 = EXCLUDED.p10,
                       p25 = EXCLUDED.p25,
                       p50 = EXCLUDED.p50,
                       p75 = EXCLUDED.p75,
                       p90 = EXCLUDED.p90,
                       min_val = EXCLUDED.min_val,
                       max_val = EXCLUDED.max_val`,
        [
          snapshot.metricId,
          snapshot.windowDays,
          snapshot.ts,
          snapshot.p10,
          snapshot.p25,
          snapshot.p50,
          snapshot.p75,
          snapshot.p90,
          snapshot.min,
          snapshot.max
        ]
      )
    );
  }

  async latest(metricId: string, windowDays: number, atOrBeforeTs?: number): Promise<PercentileSnapshot | null> {
    const params: unknown[] = [metricId, windowDays];
    const boundClause = atOrBeforeTs === undefined ? '' : `AND ts <= $${params.push(atOrBeforeTs)}`;
    const { rows } = await wrapStoreCall('percentiles.latest', () =>
      this.db.query<PercentileRow>(
        `SELECT metric_id, window_days, ts, p10, p25, p50, p75, p90, min_val, max_val
           FROM percentile_snapshots
          WHERE metric_id = $1
            AND window_days = $2
            ${boundClause}
          ORDER BY ts DESC
          LIMIT 1`,
        params
      )
    );
    const row = rows[0];
    if (!row) return null;
    return {
      metricId: row.metric_id,
      windowDays: toNumber(row.window_days),
      ts: toNumber(row.ts),
      p10: toNumber(row.p10),
      p25: toNumber(row.p25),
      p50: toNumber(row.p50),
      p75: toNumber(row.p75),
      p90: toNumber(row.p90),
      min: toNumber(row.min_val),
      max: toNumber(row.max_val)
    };
  }
}
