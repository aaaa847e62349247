import { rankWithinSummary, summarizeDistribution } from './internal/percentiles';
import type { MeasurementStore, PercentileStore } from './stores';
import {
  SECONDS_PER_DAY,
  absent,
  present,
  type PercentileSnapshot,
  type Result,
  type ScoringLogger
} from './types';

export type NormalizerOptions = {
  primaryWindowDays: number;
  fallbackWindowDays: number;
  minPrimaryPoints: number;
  minFallbackPoints: number;
};

export const DEFAULT_NORMALIZER_OPTIONS: NormalizerOptions = {
  primaryWindowDays: 365,
  fallbackWindowDays: 90,
  minPrimaryPoints: 30,
  minFallbackPoints: 10
};

export type RankedValue = {
  rank: number;
  windowDays: number;
};

export type NormalizationSummary = {
  asOf: number;
  computed: PercentileSnapshot[];
  skipped: Array<{ metricId: string; message: string }>;
};

export class Normalizer {
  private readonly options: NormalizerOptions;
  private readonly logger: ScoringLogger;

  constructor(
    private readonly measurements: MeasurementStore,
    private readonly percentiles: PercentileStore,
    options: Partial<NormalizerOptions> = {},
    logger: ScoringLogger = console
  ) {
    this.options = { ...DEFAULT_NORMALIZER_OPTIONS, ...options };
    this.logger = logger;
  }

  /**
   * Estimates the distribution of a metric over the primary window (or the
   * fallback window when history is thin) and stores it as a snapshot at `asOf`.
   */
  async computePercentiles(metricId: string, asOf: number): Promise<Result<PercentileSnapshot>> {
    const { primaryWindowDays, fallbackWindowDays, minPrimaryPoints, minFallbackPoints } = this.options;

    let windowDays = primaryWindowDays;
    let history = await this.measurements.rangeQuery(metricId, asOf - primaryWindowDays * SECONDS_PER_DAY, asOf);

    if (history.length < minPrimaryPoints) {
      windowDays = fallbackWindowDays;
      history = await this.measurements.rangeQuery(metricId, asOf - fallbackWindowDays * SECONDS_PER_DAY, asOf);

      if (history.length < minFallbackPoints) {
        const message = `Insufficient data for ${metricId}: only ${history.length} points`;
        this.logger.warn(message, { metricId, points: history.length, windowDays });
        return absent('INSUFFICIENT_DATA', message);
      }
    }

    const snapshot: PercentileSnapshot = {
      metricId,
      windowDays,
      ts: asOf,
      ...summarizeDistribution(history.map((point) => point.value))
    };
    await this.percentiles.upsert(snapshot);

    this.logger.debug(`Calculated percentiles for ${metricId}`, {
      metricId,
      windowDays,
      points: history.length,
      p50: snapshot.p50,
      min: snapshot.min,
      max: snapshot.max
    });
    return present(snapshot);
  }

  async normalizeAll(asOf: number): Promise<NormalizationSummary> {
    const metricIds = await this.measurements.listMetricIds();
    const summary: NormalizationSummary = { asOf, computed: [], skipped: [] };

    if (metricIds.length === 0) {
      this.logger.warn('No metrics found to normalize');
      return summary;
    }

    for (const metricId of metricIds) {
      const result = await this.computePercentiles(metricId, asOf);
      if (result.status === 'present') {
        summary.computed.push(result.value);
      } else {
        summary.skipped.push({ metricId, message: result.message });
      }
    }

    this.logger.info(`Completed normalization for ${metricIds.length} metrics`, {
      computed: summary.computed.length,
      skipped: summary.skipped.length
    });
    return summary;
  }

  /** Ranks `value` against the newest snapshot taken at or before `atOrBeforeTs` (any time when omitted). */
  async rank(metricId: string, value: number, atOrBeforeTs?: number): Promise<Result<RankedValue>> {
    const { primaryWindowDays, fallbackWindowDays } = this.options;
    const snapshot =
      (await this.percentiles.latest(metricId, primaryWindowDays, atOrBeforeTs)) ??
      (await this.percentiles.latest(metricId, fallbackWindowDays, atOrBeforeTs));

    if (!snapshot) {
      return absent('NO_DISTRIBUTION', `No percentile distribution for ${metricId}`);
    }
    return present({ rank: rankWithinSummary(snapshot, value), windowDays: snapshot.windowDays });
  }
}
