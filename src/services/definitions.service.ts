import { database, type Database } from '../db';
import { wrapStoreCall } from '../domains/scoring/errors';
import type { DefinitionCatalog } from '../domains/scoring/catalog';
import type { DefinitionSource } from '../domains/scoring/stores';
import { toNullableNumber } from '../lib/numbers';

type MetricDefinitionRow = {
  metric_id: string;
  pillar_id: string;
  name: string | null;
  description: string | null;
  direction: string;
  target_min: number | string | null;
  target_max: number | string | null;
  weight: number | string | null;
};

type PillarDefinitionRow = {
  pillar_id: string;
  name: string;
  description: string | null;
  weight: number | string | null;
};

/**
 * Reads the definition tables. Rows are returned in the catalog's input shape
 * and validated by DefinitionCatalog.fromRecords.
 */
export class PgDefinitionSource implements DefinitionSource {
  constructor(private readonly db: Database = database) {}

  async loadMetricDefinitions(): Promise<unknown[]> {
    const { rows } = await wrapStoreCall('definitions.loadMetrics', () =>
      this.db.query<MetricDefinitionRow>(
        `SELECT metric_id, pillar_id, name, description, direction, target_min, target_max, weight
           FROM metric_definitions
          ORDER BY pillar_id, metric_id`
      )
    );
    return rows.map((row) => ({
      metricId: row.metric_id,
      pillarId: row.pillar_id,
      name: row.name ?? undefined,
      description: row.description,
      direction: row.direction,
      weight: toNullableNumber(row.weight),
      targetMin: toNullableNumber(row.target_min),
      targetMax: toNullableNumber(row.target_max)
    }));
  }

  async loadPillarDefinitions(): Promise<unknown[]> {
    const { rows } = await wrapStoreCall('definitions.loadPillars', () =>
      this.db.query<PillarDefinitionRow>(
        `SELECT pillar_id, name, description, weight
           FROM pillar_definitions
          ORDER BY pillar_id`
      )
    );
    return rows.map((row) => ({
      pillarId: row.pillar_id,
      name: row.name,
      description: row.description,
      weight: toNullableNumber(row.weight)
    }));
  }

  /** Replaces the stored definitions with a validated catalog. */
  async saveCatalog(catalog: DefinitionCatalog): Promise<void> {
    await wrapStoreCall('definitions.saveCatalog', () =>
      this.db.withTransaction(async (client) => {
        for (const pillar of catalog.pillars) {
          await client.query(
            `INSERT INTO pillar_definitions (pillar_id, name, description, weight)
             VALUES ($1, $2, $3, $4)
             ON CONFLICT (pillar_id)
             DO UPDATE SET name = EXCLUDED.name,
                           description = EXCLUDED.description,
                           weight = EXCLUDED.weight`,
            [pillar.pillarId, pillar.name, pillar.description, pillar.weight]
          );
        }
        for (const metric of catalog.metrics) {
          const band = metric.direction === 'target_band' ? [metric.targetMin, metric.targetMax] : [null, null];
          await client.query(
            `INSERT INTO metric_definitions
               (metric_id, pillar_id, name, description, direction, target_min, target_max, weight)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             ON CONFLICT (metric_id)
             DO UPDATE SET pillar_id = EXCLUDED.pillar_id,
                           name = EXCLUDED.name,
                           description = EXCLUDED.description,
                           direction = EXCLUDED.direction,
                           target_min = EXCLUDED.target_min,
                           target_max = EXCLUDED.target_max,
                           weight = EXCLUDED.weight`,
            [
              metric.metricId,
              metric.pillarId,
              metric.name,
              metric.description,
              metric.direction,
              band[0],
              band[1],
              metric.weight
            ]
          );
        }
      })
    );
  }
}
