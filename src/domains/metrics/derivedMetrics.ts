import type { MeasurementStore } from '../scoring/stores';
import type { MeasurementPoint, ScoringLogger } from '../scoring/types';
import {
  difficultyMomentum,
  feeElasticity,
  feeShare,
  giniCoefficient,
  growthRate,
  hashprice,
  herfindahlIndex,
  normalizedEntropy,
  ratio,
  topShare,
  type HashpriceInput
} from './formulas';

export const DERIVED_METRIC_IDS = {
  poolHhi: 'decent.pool_hhi',
  poolTop3: 'decent.pool_top3',
  nodeAsnHhi: 'decent.node_asn_hhi',
  nodeAsnTop3: 'decent.node_asn_top3',
  clientEntropy: 'decent.client_entropy',
  hashprice: 'security.hashprice',
  feeShare: 'security.fee_share',
  difficultyMomentum: 'security.difficulty_momentum',
  feeElasticity: 'throughput.fee_elasticity',
  segwitUsage: 'adoption.segwit_usage',
  capacityGrowth: 'lightning.capacity_growth',
  channelGrowth: 'lightning.channel_growth',
  nodeConcentration: 'lightning.node_concentration'
} as const;

export type Concentration = {
  hhi: number;
  top3: number;
};

export type LightningSnapshot = {
  capacity: number;
  channels: number;
};

/**
 * Turns collector inputs into derived measurements. A formula without a defined
 * value (empty or zero totals) writes nothing and returns null.
 */
export class DerivedMetricsRecorder {
  constructor(
    private readonly measurements: MeasurementStore,
    private readonly logger: ScoringLogger = console
  ) {}

  async recordPoolConcentration(shares: number[], ts: number): Promise<Concentration | null> {
    return this.recordConcentration(DERIVED_METRIC_IDS.poolHhi, DERIVED_METRIC_IDS.poolTop3, shares, ts);
  }

  async recordNodeAsnConcentration(asnNodeCounts: number[], ts: number): Promise<Concentration | null> {
    return this.recordConcentration(DERIVED_METRIC_IDS.nodeAsnHhi, DERIVED_METRIC_IDS.nodeAsnTop3, asnNodeCounts, ts);
  }

  async recordClientDiversity(clientNodeCounts: number[], ts: number): Promise<number | null> {
    return this.write(DERIVED_METRIC_IDS.clientEntropy, normalizedEntropy(clientNodeCounts), ts);
  }

  async recordHashprice(input: HashpriceInput, ts: number): Promise<number | null> {
    return this.write(DERIVED_METRIC_IDS.hashprice, hashprice(input), ts, 'USD/TH/day');
  }

  async recordFeeShare(totalFees: number, totalSubsidy: number, ts: number): Promise<number | null> {
    return this.write(DERIVED_METRIC_IDS.feeShare, feeShare(totalFees, totalSubsidy), ts);
  }

  async recordDifficultyMomentum(estimatedChangePct: number, ts: number): Promise<number | null> {
    return this.write(DERIVED_METRIC_IDS.difficultyMomentum, difficultyMomentum(estimatedChangePct), ts);
  }

  async recordFeeElasticity(
    mempoolSizes: MeasurementPoint[],
    feeRates: MeasurementPoint[],
    ts: number
  ): Promise<number | null> {
    return this.write(DERIVED_METRIC_IDS.feeElasticity, feeElasticity(mempoolSizes, feeRates), ts);
  }

  async recordSegwitUsage(segwitTxCount: number, totalTxCount: number, ts: number): Promise<number | null> {
    return this.write(DERIVED_METRIC_IDS.segwitUsage, ratio(segwitTxCount, totalTxCount), ts);
  }

  async recordLightningGrowth(
    current: LightningSnapshot,
    monthAgo: LightningSnapshot,
    ts: number
  ): Promise<{ capacityGrowth: number | null; channelGrowth: number | null }> {
    const capacityGrowth = await this.write(
      DERIVED_METRIC_IDS.capacityGrowth,
      growthRate(current.capacity, monthAgo.capacity),
      ts
    );
    const channelGrowth = await this.write(
      DERIVED_METRIC_IDS.channelGrowth,
      growthRate(current.channels, monthAgo.channels),
      ts
    );
    return { capacityGrowth, channelGrowth };
  }

  async recordLiquidityConcentration(nodeCapacities: number[], ts: number): Promise<number | null> {
    return this.write(DERIVED_METRIC_IDS.nodeConcentration, giniCoefficient(nodeCapacities), ts);
  }

  private async recordConcentration(
    hhiMetricId: string,
    topMetricId: string,
    shares: number[],
    ts: number
  ): Promise<Concentration | null> {
    const hhi = herfindahlIndex(shares);
    const top3 = topShare(shares, 3);
    if (hhi === null || top3 === null) {
      this.logger.warn(`No shares to compute ${hhiMetricId}`, { metricId: hhiMetricId });
      return null;
    }
    await this.write(hhiMetricId, hhi, ts);
    await this.write(topMetricId, top3, ts);
    return { hhi, top3 };
  }

  private async write(metricId: string, value: number | null, ts: number, unit: string | null = null): Promise<number | null> {
    if (value === null || !Number.isFinite(value)) {
      this.logger.debug(`Skipped ${metricId}: value undefined for inputs`, { metricId });
      return null;
    }
    await this.measurements.upsert({ metricId, ts, value, unit });
    this.logger.info(`Recorded ${metricId}`, { metricId, value, ts });
    return value;
  }
}
