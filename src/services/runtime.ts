import { database, type Database } from '../db';
import type { ScoringConfig } from '../config/scoring';
import { DefinitionCatalog, loadCatalogFile, loadCatalogFromSource } from '../domains/scoring/catalog';
import type { ScoringRuntime } from '../domains/scoring/pass';
import type { ScoringLogger } from '../domains/scoring/types';
import { PgDefinitionSource } from './definitions.service';
import { PgMeasurementStore } from './measurements.service';
import { PgPercentileStore } from './percentiles.service';
import { PgScoreRunLog } from './scoreRuns.service';
import { PgScoreStore } from './scores.service';

/**
 * Returns a catalog loader for the configured source. Unless the config asks
 * for a reload on every pass, the first successful load is reused.
 */
export function createCatalogLoader(
  config: Pick<ScoringConfig, 'catalogSource' | 'catalogPath' | 'reloadCatalogEachPass'>,
  db: Database = database
): () => Promise<DefinitionCatalog> {
  const load = () =>
    config.catalogSource === 'database'
      ? loadCatalogFromSource(new PgDefinitionSource(db))
      : loadCatalogFile(config.catalogPath);

  if (config.reloadCatalogEachPass) return load;

  let cached: DefinitionCatalog | null = null;
  return async () => {
    if (!cached) {
      cached = await load();
    }
    return cached;
  };
}

export function createPgScoringRuntime(
  config: ScoringConfig,
  options: { db?: Database; logger?: ScoringLogger } = {}
): ScoringRuntime {
  const db = options.db ?? database;
  return {
    measurements: new PgMeasurementStore(db),
    percentiles: new PgPercentileStore(db),
    scores: new PgScoreStore(db),
    runs: new PgScoreRunLog(db),
    loadCatalog: createCatalogLoader(config, db),
    normalizerOptions: config.normalizer,
    logger: options.logger
  };
}
