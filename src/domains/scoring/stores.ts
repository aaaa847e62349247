import type {
  Measurement,
  MeasurementPoint,
  MetricDefinition,
  PercentileSnapshot,
  PillarDefinition,
  ScoreKind,
  ScoreRecord
} from './types';

export interface MeasurementStore {
  upsert(measurement: Measurement): Promise<void>;
  /** Points with `sinceTs <= ts` (and `ts <= untilTs` when given), ascending by ts. */
  rangeQuery(metricId: string, sinceTs: number, untilTs?: number): Promise<MeasurementPoint[]>;
  latest(metricId: string, atOrBeforeTs?: number): Promise<Measurement | null>;
  listMetricIds(): Promise<string[]>;
}

export interface PercentileStore {
  upsert(snapshot: PercentileSnapshot): Promise<void>;
  /** Newest snapshot for the window, at or before `atOrBeforeTs` when given. */
  latest(metricId: string, windowDays: number, atOrBeforeTs?: number): Promise<PercentileSnapshot | null>;
}

export interface ScoreStore {
  upsert(record: ScoreRecord): Promise<void>;
  /** Writes every record or none of them. */
  upsertMany(records: ScoreRecord[]): Promise<void>;
  latest(kind: ScoreKind, id: string): Promise<ScoreRecord | null>;
  latestAtOrBefore(kind: ScoreKind, id: string, ts: number): Promise<ScoreRecord | null>;
  range(kind: ScoreKind, id: string, sinceTs: number): Promise<ScoreRecord[]>;
}

export interface DefinitionSource {
  loadMetricDefinitions(): Promise<unknown[]>;
  loadPillarDefinitions(): Promise<unknown[]>;
}

export type ScoreRunStatus = 'running' | 'completed' | 'failed';

export type ScoreRunSummary = {
  metricsScored: number;
  metricsOmitted: number;
  pillarsScored: number;
  overallScore: number | null;
};

export interface ScoreRunLog {
  start(asOf: number, notes?: string): Promise<string>;
  complete(runId: string, summary: ScoreRunSummary): Promise<void>;
  fail(runId: string, message: string): Promise<void>;
  setMeta(key: string, value: string): Promise<void>;
}
