import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { getScoringConfig } from '../config/scoring';
import { FakeDatabase } from '../test/fakeDatabase';
import { createCatalogLoader, createPgScoringRuntime } from './runtime';

const catalogPath = path.resolve(process.cwd(), 'config/catalog.json');

describe('createCatalogLoader', () => {
  it('loads the catalog file once per process by default', async () => {
    const load = createCatalogLoader({ catalogSource: 'file', catalogPath, reloadCatalogEachPass: false });

    const first = await load();
    const second = await load();

    expect(second).toBe(first);
    expect(first.metrics).toHaveLength(15);
  });

  it('reloads on every call when asked to', async () => {
    const load = createCatalogLoader({ catalogSource: 'file', catalogPath, reloadCatalogEachPass: true });

    expect(await load()).not.toBe(await load());
  });

  it('reads the definition tables for the database source', async () => {
    const db = new FakeDatabase((text) =>
      text.includes('FROM pillar_definitions') ? [{ pillar_id: 'lightning', name: 'Lightning', description: null, weight: 0.15 }] : []
    );
    const load = createCatalogLoader({ catalogSource: 'database', catalogPath, reloadCatalogEachPass: true }, db);

    const catalog = await load();

    expect(catalog.pillars.map((pillar) => pillar.pillarId)).toEqual(['lightning']);
    expect(db.queries).toHaveLength(2);
  });
});

describe('createPgScoringRuntime', () => {
  it('carries the configured normalizer options', () => {
    const config = getScoringConfig({ SCORING_PRIMARY_WINDOW_DAYS: '180' });

    const runtime = createPgScoringRuntime(config, { db: new FakeDatabase() });

    expect(runtime.normalizerOptions?.primaryWindowDays).toBe(180);
  });
});
