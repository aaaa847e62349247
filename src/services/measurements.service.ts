import { database, type Queryable } from '../db';
import { wrapStoreCall } from '../domains/scoring/errors';
import type { MeasurementStore } from '../domains/scoring/stores';
import type { Measurement, MeasurementPoint } from '../domains/scoring/types';
import { toNumber } from '../lib/numbers';

type MeasurementRow = {
  metric_id: string;
  ts: number | string;
  value: number | string;
  unit: string | null;
};

function mapMeasurement(row: MeasurementRow): Measurement {
  return {
    metricId: row.metric_id,
    ts: toNumber(row.ts),
    value: toNumber(row.value),
    unit: row.unit
  };
}

export class PgMeasurementStore implements MeasurementStore {
  constructor(private readonly db: Queryable = database) {}

  async upsert(measurement: Measurement): Promise<void> {
    await wrapStoreCall('measurements.upsert', () =>
      this.db.query(
        `INSERT INTO measurements (metric_id, ts, value, unit)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (metric_id, ts)
         DO UPDATE SET value = EXCLUDED.value, unit = EXCLUDED.unit`,
        [measurement.metricId, measurement.ts, measurement.value, measurement.unit]
      )
    );
  }

  async rangeQuery(metricId: string, sinceTs: number, untilTs?: number): Promise<MeasurementPoint[]> {
    const params: unknown[] = [metricId, sinceTs];
    const untilClause = untilTs === undefined ? '' : `AND ts <= $${params.push(untilTs)}`;
    const { rows } = await wrapStoreCall('measurements.rangeQuery', () =>
      this.db.query<Pick<MeasurementRow, 'ts' | 'value'>>(
        `SELECT ts, value
           FROM measurements
          WHERE metric_id = $1
            AND ts >= $2
            ${untilClause}
          ORDER BY ts ASC`,
        params
      )
    );
    return rows.map((row) => ({ ts: toNumber(row.ts), value: toNumber(row.value) }));
  }

  async latest(metricId: string, atOrBeforeTs?: number): Promise<Measurement | null> {
    const params: unknown[] = [metricId];
    const boundClause = atOrBeforeTs === undefined ? '' : `AND ts <= $${params.push(atOrBeforeTs)}`;
    const { rows } = await wrapStoreCall('measurements.latest', () =>
      this.db.query<MeasurementRow>(
        `SELECT metric_id, ts, value, unit
           FROM measurements
          WHERE metric_id = $1
            ${boundClause}
          ORDER BY ts DESC
          LIMIT 1`,
        params
      )
    );
    const row = rows[0];
    return row ? mapMeasurement(row) : null;
  }

  async listMetricIds(): Promise<string[]> {
    const { rows } = await wrapStoreCall('measurements.listMetricIds', () =>
      this.db.query<{ metric_id: string }>('SELECT DISTINCT metric_id FROM measurements ORDER BY metric_id')
    );
    return rows.map((row) => row.metric_id);
  }
}
