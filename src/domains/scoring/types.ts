export const SECONDS_PER_DAY = 86_400;

export const OVERALL_SCORE_ID = 'overall';

export type MetricDirection = 'higher_better' | 'lower_better' | 'target_band';

export type ScoreKind = 'metric' | 'pillar' | 'overall';

export type Measurement = {
  metricId: string;
  ts: number; // unix seconds
  value: number;
  unit: string | null;
};

export type MeasurementPoint = {
  ts: number;
  value: number;
};

export type PercentileSummary = {
  p10: number;
  p25: number;
  p50: number;
  p75: number;
  p90: number;
  min: number;
  max: number;
};

export type PercentileSnapshot = PercentileSummary & {
  metricId: string;
  windowDays: number; // window actually used (primary or fallback)
  ts: number;
};

export type ScoreRecord = {
  kind: ScoreKind;
  id: string;
  ts: number;
  score: number;
  trend7d: number | null;
  trend30d: number | null;
};

type MetricDefinitionBase = {
  metricId: string;
  pillarId: string;
  name: string;
  description: string | null;
  weight: number;
};

export type RankedMetricDefinition = MetricDefinitionBase & {
  direction: 'higher_better' | 'lower_better';
};

export type TargetBandMetricDefinition = MetricDefinitionBase & {
  direction: 'target_band';
  targetMin: number;
  targetMax: number;
};

export type MetricDefinition = RankedMetricDefinition | TargetBandMetricDefinition;

export type PillarDefinition = {
  pillarId: string;
  name: string;
  description: string | null;
  weight: number;
};

export type AbsenceReason =
  | 'INSUFFICIENT_DATA'
  | 'NO_DISTRIBUTION'
  | 'MISSING_DEFINITION'
  | 'ZERO_WEIGHT'
  | 'NO_MEASUREMENT';

export type Present<T> = { status: 'present'; value: T };

export type Absent = { status: 'absent'; reason: AbsenceReason; message: string };

/**
 * Outcome of a computation that may legitimately produce nothing.
 * Absence is never defaulted to a number by callers.
 */
export type Result<T> = Present<T> | Absent;

export function present<T>(value: T): Present<T> {
  return { status: 'present', value };
}

export function absent(reason: AbsenceReason, message: string): Absent {
  return { status: 'absent', reason, message };
}

export function isPresent<T>(result: Result<T>): result is Present<T> {
  return result.status === 'present';
}

export type ScoringLogger = {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
};

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
