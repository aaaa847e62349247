import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DefinitionCatalog } from '../domains/scoring/catalog';
import type { ScoringRuntime } from '../domains/scoring/pass';
import {
  MemoryMeasurementStore,
  MemoryPercentileStore,
  MemoryScoreRunLog,
  MemoryScoreStore,
  RecordingLogger
} from '../test/memoryStores';
import { getScoreJobStatus, recalculateScores } from './scoreRecompute.job';

const AS_OF = 1_760_000_000;

const catalog = DefinitionCatalog.fromRecords(
  [{ metricId: 'adoption.rbf_activity', pillarId: 'adoption', direction: 'target_band', targetMin: 2, targetMax: 15 }],
  [{ pillarId: 'adoption', name: 'Adoption', weight: 1 }]
);

function buildRuntime(loadCatalog: () => Promise<DefinitionCatalog> = async () => catalog) {
  const measurements = new MemoryMeasurementStore();
  const runs = new MemoryScoreRunLog();
  const runtime: ScoringRuntime = {
    measurements,
    percentiles: new MemoryPercentileStore(),
    scores: new MemoryScoreStore(),
    runs,
    loadCatalog,
    logger: new RecordingLogger()
  };
  return { runtime, measurements, runs };
}

describe('recalculateScores', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('runs a pass and records the job status', async () => {
    const { runtime, measurements } = buildRuntime();
    await measurements.upsert({ metricId: 'adoption.rbf_activity', ts: AS_OF, value: 8.5, unit: '%' });

    const summary = await recalculateScores(runtime, { asOf: AS_OF });

    expect(summary?.scores.overallScore).toBe(100);
    expect(console.log).toHaveBeenCalledWith('   Percentiles: 0 computed, 1 skipped');
    const status = getScoreJobStatus();
    expect(status.isRunning).toBe(false);
    expect(status.lastRunId).toBe(summary?.runId);
    expect(status.lastError).toBeNull();
    expect(status.lastRunTime).not.toBeNull();
  });

  it('skips a trigger while a pass is in flight', async () => {
    let release: (value: DefinitionCatalog) => void = () => undefined;
    const gate = new Promise<DefinitionCatalog>((resolve) => {
      release = resolve;
    });
    const { runtime } = buildRuntime(() => gate);

    const first = recalculateScores(runtime, { asOf: AS_OF });
    expect(getScoreJobStatus().isRunning).toBe(true);

    const second = await recalculateScores(runtime, { asOf: AS_OF });
    expect(second).toBeNull();
    expect(console.warn).toHaveBeenCalledWith('⚠️  Score recompute already running, skipping');

    release(catalog);
    const summary = await first;
    expect(summary?.runId).toBe('run-1');
    expect(getScoreJobStatus().isRunning).toBe(false);
  });

  it('releases the lock and rethrows when the pass fails', async () => {
    const { runtime, runs } = buildRuntime(async () => {
      throw new Error('catalog unavailable');
    });

    await expect(recalculateScores(runtime, { asOf: AS_OF })).rejects.toThrow('catalog unavailable');

    expect(runs.runs[0]?.status).toBe('failed');
    expect(getScoreJobStatus()).toMatchObject({ isRunning: false, lastError: 'catalog unavailable' });
  });
});
