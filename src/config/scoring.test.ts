import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { getScoringConfig, resolveSchedulerStartupMode, ScoringConfigError } from './scoring';

describe('getScoringConfig', () => {
  it('falls back to defaults', () => {
    const config = getScoringConfig({});

    expect(config.normalizer).toEqual({
      primaryWindowDays: 365,
      fallbackWindowDays: 90,
      minPrimaryPoints: 30,
      minFallbackPoints: 10
    });
    expect(config.recomputeCron).toBe('*/30 * * * *');
    expect(config.catalogSource).toBe('file');
    expect(config.catalogPath).toBe(path.resolve('config/catalog.json'));
    expect(config.reloadCatalogEachPass).toBe(false);
    expect(config.scheduler).toEqual({ runInProcessJobs: false, schedulerEnabled: false });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = getScoringConfig({
      SCORING_PRIMARY_WINDOW_DAYS: '180',
      SCORING_FALLBACK_WINDOW_DAYS: '30',
      SCORING_MIN_PRIMARY_POINTS: '20',
      SCORING_MIN_FALLBACK_POINTS: '5',
      SCORE_RECOMPUTE_CRON: '0 * * * *',
      CATALOG_SOURCE: 'Database',
      CATALOG_RELOAD_EACH_PASS: 'true'
    });

    expect(config.normalizer).toEqual({
      primaryWindowDays: 180,
      fallbackWindowDays: 30,
      minPrimaryPoints: 20,
      minFallbackPoints: 5
    });
    expect(config.recomputeCron).toBe('0 * * * *');
    expect(config.catalogSource).toBe('database');
    expect(config.reloadCatalogEachPass).toBe(true);
  });

  it('ignores unparseable numbers', () => {
    expect(getScoringConfig({ SCORING_PRIMARY_WINDOW_DAYS: 'soon' }).normalizer.primaryWindowDays).toBe(365);
  });

  it('rejects a fallback window longer than the primary window', () => {
    expect(() => getScoringConfig({ SCORING_PRIMARY_WINDOW_DAYS: '60' })).toThrow(
      'Fallback window (90d) cannot exceed primary window (60d)'
    );
  });

  it('rejects inconsistent point thresholds', () => {
    expect(() => getScoringConfig({ SCORING_MIN_PRIMARY_POINTS: '5' })).toThrow(ScoringConfigError);
    expect(() => getScoringConfig({ SCORING_MIN_FALLBACK_POINTS: '0' })).toThrow(ScoringConfigError);
  });

  it('rejects non-positive windows', () => {
    expect(() => getScoringConfig({ SCORING_FALLBACK_WINDOW_DAYS: '-1' })).toThrow(ScoringConfigError);
  });

  it('rejects an invalid cron expression', () => {
    expect(() => getScoringConfig({ SCORE_RECOMPUTE_CRON: 'every now and then' })).toThrow(
      'Invalid cron expression "every now and then"'
    );
  });

  it('rejects an unknown catalog source', () => {
    try {
      getScoringConfig({ CATALOG_SOURCE: 'yaml' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ScoringConfigError);
      expect(err instanceof ScoringConfigError ? err.variable : null).toBe('CATALOG_SOURCE');
    }
  });
});

describe('resolveSchedulerStartupMode', () => {
  it('keeps the scheduler off unless in-process jobs are enabled', () => {
    expect(resolveSchedulerStartupMode({ ENABLE_SCHEDULER: 'true' }, 'production')).toEqual({
      runInProcessJobs: false,
      schedulerEnabled: false
    });
  });

  it('requires an explicit opt-in during development', () => {
    expect(resolveSchedulerStartupMode({ RUN_INPROCESS_JOBS: '1' }, 'development')).toEqual({
      runInProcessJobs: true,
      schedulerEnabled: false
    });
    expect(resolveSchedulerStartupMode({ RUN_INPROCESS_JOBS: 'yes', ENABLE_SCHEDULER: 'on' }, 'development')).toEqual({
      runInProcessJobs: true,
      schedulerEnabled: true
    });
  });

  it('enables the scheduler outside development', () => {
    expect(resolveSchedulerStartupMode({ RUN_INPROCESS_JOBS: 'true', NODE_ENV: 'production' })).toEqual({
      runInProcessJobs: true,
      schedulerEnabled: true
    });
  });
});
