import type { DefinitionCatalog } from './catalog';
import { percentChange, weightedMean } from './internal/aggregate';
import type { Normalizer } from './normalizer';
import type { MeasurementStore, ScoreStore } from './stores';
import {
  OVERALL_SCORE_ID,
  SECONDS_PER_DAY,
  absent,
  present,
  toUnixSeconds,
  type AbsenceReason,
  type MetricDefinition,
  type Result,
  type ScoreKind,
  type ScoreRecord,
  type ScoringLogger,
  type TargetBandMetricDefinition
} from './types';

export const TREND_7D_DAYS = 7;
export const TREND_30D_DAYS = 30;

export type ScoreOmission = {
  kind: ScoreKind;
  id: string;
  reason: AbsenceReason;
  message: string;
};

export type ScorePassResult = {
  asOf: number;
  records: ScoreRecord[];
  metricScores: ReadonlyMap<string, number>;
  pillarScores: ReadonlyMap<string, number>;
  overallScore: number | null;
  omissions: ScoreOmission[];
};

export type ScoreEngineDeps = {
  catalog: DefinitionCatalog;
  normalizer: Normalizer;
  measurements: MeasurementStore;
  scores: ScoreStore;
  logger?: ScoringLogger;
};

export type TrendOptions = {
  asOf?: number;
  /** Freshly computed score to compare; the latest stored score is used when omitted. */
  current?: number;
};

/**
 * Target-band scoring. Inside the band the score runs 0..100 with the center
 * scoring 100; outside it runs 0..50, floored at zero and otherwise unclamped.
 */
export function scoreTargetBand(definition: TargetBandMetricDefinition, value: number): number {
  const { targetMin, targetMax } = definition;
  const center = (targetMin + targetMax) / 2;
  const halfRange = (targetMax - targetMin) / 2;

  if (value >= targetMin && value <= targetMax) {
    return 100 * (1 - Math.abs(value - center) / halfRange);
  }
  if (value < targetMin) {
    const distance = targetMin - value;
    return Math.max(0, 50 * (1 - distance / targetMin));
  }
  const distance = value - targetMax;
  return Math.max(0, 50 * (1 - distance / targetMax));
}

export class ScoreEngine {
  private readonly catalog: DefinitionCatalog;
  private readonly normalizer: Normalizer;
  private readonly measurements: MeasurementStore;
  private readonly scores: ScoreStore;
  private readonly logger: ScoringLogger;

  constructor(deps: ScoreEngineDeps) {
    this.catalog = deps.catalog;
    this.normalizer = deps.normalizer;
    this.measurements = deps.measurements;
    this.scores = deps.scores;
    this.logger = deps.logger ?? console;
  }

  async scoreMetric(definition: MetricDefinition, latestValue: number, asOf?: number): Promise<Result<number>> {
    if (definition.direction === 'target_band') {
      return present(scoreTargetBand(definition, latestValue));
    }

    const ranked = await this.normalizer.rank(definition.metricId, latestValue, asOf);
    if (ranked.status === 'absent') {
      return ranked;
    }
    const { rank } = ranked.value;
    return present(definition.direction === 'higher_better' ? rank * 100 : (1 - rank) * 100);
  }

  async scoreMetricById(metricId: string, asOf: number = toUnixSeconds(new Date())): Promise<Result<number>> {
    const definition = this.catalog.getMetric(metricId);
    if (!definition) {
      return absent('MISSING_DEFINITION', `No definition for metric ${metricId}`);
    }
    return this.scoreMetricAt(definition, asOf);
  }

  scorePillar(pillarId: string, metricScores: ReadonlyMap<string, number>): Result<number> {
    if (!this.catalog.getPillar(pillarId)) {
      return absent('MISSING_DEFINITION', `No definition for pillar ${pillarId}`);
    }

    const mean = weightedMean(
      this.catalog.metricsForPillar(pillarId).map((metric) => ({
        score: metricScores.get(metric.metricId),
        weight: metric.weight
      }))
    );
    if (mean.value === null) {
      return absent('ZERO_WEIGHT', `No weighted metric scores for pillar ${pillarId}`);
    }
    return present(mean.value);
  }

  scoreOverall(pillarScores: ReadonlyMap<string, number>): Result<number> {
    const mean = weightedMean(
      this.catalog.pillars.map((pillar) => ({
        score: pillarScores.get(pillar.pillarId),
        weight: pillar.weight
      }))
    );
    if (mean.value === null) {
      return absent('ZERO_WEIGHT', 'No weighted pillar scores for the overall score');
    }
    return present(mean.value);
  }

  /**
   * Percentage change against the nearest stored score at or before `asOf - days`.
   * Null when either side is missing or the historical score is zero.
   */
  async trend(kind: ScoreKind, id: string, days: number, options: TrendOptions = {}): Promise<number | null> {
    const asOf = options.asOf ?? toUnixSeconds(new Date());
    const current = options.current ?? (await this.scores.latest(kind, id))?.score;
    if (current === undefined) return null;

    const historical = await this.scores.latestAtOrBefore(kind, id, asOf - days * SECONDS_PER_DAY);
    if (!historical) return null;

    return percentChange(current, historical.score);
  }

  async computeAll(options: { asOf?: number } = {}): Promise<ScorePassResult> {
    const asOf = options.asOf ?? toUnixSeconds(new Date());
    const omissions: ScoreOmission[] = [];
    const computed: Array<{ kind: ScoreKind; id: string; score: number }> = [];

    const metricScores = new Map<string, number>();
    for (const definition of this.catalog.metrics) {
      const result = await this.scoreMetricAt(definition, asOf);
      if (result.status === 'absent') {
        this.omit(omissions, 'metric', definition.metricId, result.reason, result.message);
        continue;
      }
      metricScores.set(definition.metricId, result.value);
      computed.push({ kind: 'metric', id: definition.metricId, score: result.value });
      this.logger.debug(`Metric ${definition.metricId}: ${result.value.toFixed(1)}/100`);
    }

    // Pillars aggregate this pass's metric map only, never previously stored scores.
    const pillarScores = new Map<string, number>();
    for (const pillar of this.catalog.pillars) {
      const result = this.scorePillar(pillar.pillarId, metricScores);
      if (result.status === 'absent') {
        this.omit(omissions, 'pillar', pillar.pillarId, result.reason, result.message);
        continue;
      }
      pillarScores.set(pillar.pillarId, result.value);
      computed.push({ kind: 'pillar', id: pillar.pillarId, score: result.value });
      this.logger.info(`Pillar ${pillar.pillarId}: ${result.value.toFixed(1)}/100`);
    }

    const overall = this.scoreOverall(pillarScores);
    let overallScore: number | null = null;
    if (overall.status === 'present') {
      overallScore = overall.value;
      computed.push({ kind: 'overall', id: OVERALL_SCORE_ID, score: overall.value });
      this.logger.info(`Overall score: ${overall.value.toFixed(1)}/100`);
    } else {
      this.omit(omissions, 'overall', OVERALL_SCORE_ID, overall.reason, overall.message);
    }

    const records: ScoreRecord[] = [];
    for (const entry of computed) {
      const [trend7d, trend30d] = await Promise.all([
        this.trend(entry.kind, entry.id, TREND_7D_DAYS, { asOf, current: entry.score }),
        this.trend(entry.kind, entry.id, TREND_30D_DAYS, { asOf, current: entry.score })
      ]);
      records.push({ kind: entry.kind, id: entry.id, ts: asOf, score: entry.score, trend7d, trend30d });
    }

    await this.scores.upsertMany(records);

    this.logger.info('Completed score calculations', {
      asOf,
      metricsScored: metricScores.size,
      pillarsScored: pillarScores.size,
      omitted: omissions.length
    });

    return { asOf, records, metricScores, pillarScores, overallScore, omissions };
  }

  private async scoreMetricAt(definition: MetricDefinition, asOf: number): Promise<Result<number>> {
    const latest = await this.measurements.latest(definition.metricId, asOf);
    if (!latest) {
      return absent('NO_MEASUREMENT', `No data for metric ${definition.metricId}`);
    }
    return this.scoreMetric(definition, latest.value, asOf);
  }

  private omit(omissions: ScoreOmission[], kind: ScoreKind, id: string, reason: AbsenceReason, message: string) {
    omissions.push({ kind, id, reason, message });
    this.logger.warn(message, { kind, id, reason });
  }
}
