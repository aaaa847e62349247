import path from 'node:path';
import cron from 'node-cron';
import { DEFAULT_NORMALIZER_OPTIONS, type NormalizerOptions } from '../domains/scoring/normalizer';

export type CatalogSourceKind = 'file' | 'database';

export type SchedulerStartupMode = {
  runInProcessJobs: boolean;
  schedulerEnabled: boolean;
};

export type ScoringConfig = {
  normalizer: NormalizerOptions;
  recomputeCron: string;
  catalogSource: CatalogSourceKind;
  catalogPath: string;
  reloadCatalogEachPass: boolean;
  scheduler: SchedulerStartupMode;
};

export const DEFAULT_RECOMPUTE_CRON = '*/30 * * * *';
export const DEFAULT_CATALOG_PATH = 'config/catalog.json';

export class ScoringConfigError extends Error {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(message);
    this.name = 'ScoringConfigError';
  }
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;
  return fallback;
}

function isTruthyValue(value: string | undefined): boolean {
  const normalized = String(value ?? '').trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

function parseCatalogSource(value: string | undefined): CatalogSourceKind {
  const normalized = (value ?? 'file').trim().toLowerCase();
  if (normalized === 'file' || normalized === 'database') return normalized;
  throw new ScoringConfigError('CATALOG_SOURCE', `CATALOG_SOURCE must be "file" or "database", got "${value}"`);
}

/**
 * In-process jobs are opt-in. Development additionally needs ENABLE_SCHEDULER
 * so a local API restart does not kick off recompute passes.
 */
export function resolveSchedulerStartupMode(
  env: NodeJS.ProcessEnv = process.env,
  nodeEnv: string = env.NODE_ENV ?? 'development'
): SchedulerStartupMode {
  const runInProcessJobs = isTruthyValue(env.RUN_INPROCESS_JOBS);
  if (!runInProcessJobs) {
    return { runInProcessJobs, schedulerEnabled: false };
  }
  if (nodeEnv === 'development') {
    return { runInProcessJobs, schedulerEnabled: isTruthyValue(env.ENABLE_SCHEDULER) };
  }
  return { runInProcessJobs, schedulerEnabled: true };
}

function validateNormalizerOptions(options: NormalizerOptions): void {
  if (!Number.isInteger(options.primaryWindowDays) || options.primaryWindowDays <= 0) {
    throw new ScoringConfigError('SCORING_PRIMARY_WINDOW_DAYS', 'SCORING_PRIMARY_WINDOW_DAYS must be a positive integer');
  }
  if (!Number.isInteger(options.fallbackWindowDays) || options.fallbackWindowDays <= 0) {
    throw new ScoringConfigError('SCORING_FALLBACK_WINDOW_DAYS', 'SCORING_FALLBACK_WINDOW_DAYS must be a positive integer');
  }
  if (options.fallbackWindowDays > options.primaryWindowDays) {
    throw new ScoringConfigError(
      'SCORING_FALLBACK_WINDOW_DAYS',
      `Fallback window (${options.fallbackWindowDays}d) cannot exceed primary window (${options.primaryWindowDays}d)`
    );
  }
  if (!Number.isInteger(options.minFallbackPoints) || options.minFallbackPoints < 1) {
    throw new ScoringConfigError('SCORING_MIN_FALLBACK_POINTS', 'SCORING_MIN_FALLBACK_POINTS must be at least 1');
  }
  if (!Number.isInteger(options.minPrimaryPoints) || options.minPrimaryPoints < options.minFallbackPoints) {
    throw new ScoringConfigError(
      'SCORING_MIN_PRIMARY_POINTS',
      'SCORING_MIN_PRIMARY_POINTS must be an integer no smaller than SCORING_MIN_FALLBACK_POINTS'
    );
  }
}

export function getScoringConfig(env: NodeJS.ProcessEnv = process.env): ScoringConfig {
  const normalizer: NormalizerOptions = {
    primaryWindowDays: parseNumber(env.SCORING_PRIMARY_WINDOW_DAYS, DEFAULT_NORMALIZER_OPTIONS.primaryWindowDays),
    fallbackWindowDays: parseNumber(env.SCORING_FALLBACK_WINDOW_DAYS, DEFAULT_NORMALIZER_OPTIONS.fallbackWindowDays),
    minPrimaryPoints: parseNumber(env.SCORING_MIN_PRIMARY_POINTS, DEFAULT_NORMALIZER_OPTIONS.minPrimaryPoints),
    minFallbackPoints: parseNumber(env.SCORING_MIN_FALLBACK_POINTS, DEFAULT_NORMALIZER_OPTIONS.minFallbackPoints)
  };
  validateNormalizerOptions(normalizer);

  const recomputeCron = env.SCORE_RECOMPUTE_CRON?.trim() || DEFAULT_RECOMPUTE_CRON;
  if (!cron.validate(recomputeCron)) {
    throw new ScoringConfigError('SCORE_RECOMPUTE_CRON', `Invalid cron expression "${recomputeCron}"`);
  }

  return Object.freeze({
    normalizer: Object.freeze(normalizer),
    recomputeCron,
    catalogSource: parseCatalogSource(env.CATALOG_SOURCE),
    catalogPath: path.resolve(env.CATALOG_PATH?.trim() || DEFAULT_CATALOG_PATH),
    reloadCatalogEachPass: parseBoolean(env.CATALOG_RELOAD_EACH_PASS, false),
    scheduler: Object.freeze(resolveSchedulerStartupMode(env))
  });
}
