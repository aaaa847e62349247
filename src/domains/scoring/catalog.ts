import { readFile } from 'node:fs/promises';
import type { ZodError } from 'zod';
import {
  catalogFileSchema,
  metricDefinitionInputSchema,
  pillarDefinitionInputSchema,
  type MetricDefinitionInput,
  type PillarDefinitionInput
} from '../../schemas/catalog.schema';
import { CatalogValidationError } from './errors';
import type { DefinitionSource } from './stores';
import type { MetricDefinition, PillarDefinition } from './types';

export const DEFAULT_METRIC_WEIGHT = 1.0;

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
}

function toMetricDefinition(input: MetricDefinitionInput): MetricDefinition {
  const base = {
    metricId: input.metricId,
    pillarId: input.pillarId,
    name: input.name ?? input.metricId,
    description: input.description ?? null,
    weight: input.weight ?? DEFAULT_METRIC_WEIGHT
  };
  if (input.direction === 'target_band') {
    const { targetMin, targetMax } = input;
    if (targetMin === null || targetMin === undefined || targetMax === null || targetMax === undefined) {
      throw new CatalogValidationError('CATALOG_TARGET_BAND_MISSING', `Metric ${input.metricId} has no target band`);
    }
    return { ...base, direction: 'target_band', targetMin, targetMax };
  }
  return { ...base, direction: input.direction };
}

function toPillarDefinition(input: PillarDefinitionInput): PillarDefinition {
  return {
    pillarId: input.pillarId,
    name: input.name,
    description: input.description ?? null,
    // an unset pillar weight does not participate in the overall score
    weight: input.weight ?? 0
  };
}

/**
 * Immutable set of metric and pillar definitions for one process (or one pass).
 * Built through the static constructors, which validate the raw records.
 */
export class DefinitionCatalog {
  readonly metrics: readonly MetricDefinition[];
  readonly pillars: readonly PillarDefinition[];
  private readonly metricById: ReadonlyMap<string, MetricDefinition>;
  private readonly pillarById: ReadonlyMap<string, PillarDefinition>;
  private readonly metricsByPillar: ReadonlyMap<string, readonly MetricDefinition[]>;

  private constructor(metrics: MetricDefinition[], pillars: PillarDefinition[]) {
    this.metrics = Object.freeze(metrics.map((metric) => Object.freeze({ ...metric })));
    this.pillars = Object.freeze(pillars.map((pillar) => Object.freeze({ ...pillar })));
    this.metricById = new Map(this.metrics.map((metric) => [metric.metricId, metric]));
    this.pillarById = new Map(this.pillars.map((pillar) => [pillar.pillarId, pillar]));

    const grouped = new Map<string, MetricDefinition[]>();
    for (const metric of this.metrics) {
      const list = grouped.get(metric.pillarId) ?? [];
      list.push(metric);
      grouped.set(metric.pillarId, list);
    }
    this.metricsByPillar = grouped;
    Object.freeze(this);
  }

  static fromRecords(rawMetrics: unknown[], rawPillars: unknown[]): DefinitionCatalog {
    const pillars: PillarDefinition[] = rawPillars.map((raw, index) => {
      const parsed = pillarDefinitionInputSchema.safeParse(raw);
      if (!parsed.success) {
        throw new CatalogValidationError('CATALOG_INVALID_PILLAR', `Invalid pillar definition at index ${index}: ${formatIssues(parsed.error)}`, { index });
      }
      return toPillarDefinition(parsed.data);
    });

    const metrics: MetricDefinition[] = rawMetrics.map((raw, index) => {
      const parsed = metricDefinitionInputSchema.safeParse(raw);
      if (!parsed.success) {
        throw new CatalogValidationError('CATALOG_INVALID_METRIC', `Invalid metric definition at index ${index}: ${formatIssues(parsed.error)}`, { index });
      }
      return toMetricDefinition(parsed.data);
    });

    const pillarIds = new Set<string>();
    for (const pillar of pillars) {
      if (pillarIds.has(pillar.pillarId)) {
        throw new CatalogValidationError('CATALOG_DUPLICATE_ID', `Duplicate pillar id ${pillar.pillarId}`, { pillarId: pillar.pillarId });
      }
      pillarIds.add(pillar.pillarId);
    }

    const metricIds = new Set<string>();
    for (const metric of metrics) {
      if (metricIds.has(metric.metricId)) {
        throw new CatalogValidationError('CATALOG_DUPLICATE_ID', `Duplicate metric id ${metric.metricId}`, { metricId: metric.metricId });
      }
      if (!pillarIds.has(metric.pillarId)) {
        throw new CatalogValidationError(
          'CATALOG_UNKNOWN_PILLAR',
          `Metric ${metric.metricId} references unknown pillar ${metric.pillarId}`,
          { metricId: metric.metricId, pillarId: metric.pillarId }
        );
      }
      metricIds.add(metric.metricId);
    }

    return new DefinitionCatalog(metrics, pillars);
  }

  static fromJson(raw: unknown): DefinitionCatalog {
    const parsed = catalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogValidationError('CATALOG_INVALID_FILE', `Invalid catalog: ${formatIssues(parsed.error)}`);
    }
    return DefinitionCatalog.fromRecords(parsed.data.metrics, parsed.data.pillars);
  }

  getMetric(metricId: string): MetricDefinition | undefined {
    return this.metricById.get(metricId);
  }

  getPillar(pillarId: string): PillarDefinition | undefined {
    return this.pillarById.get(pillarId);
  }

  metricsForPillar(pillarId: string): readonly MetricDefinition[] {
    return this.metricsByPillar.get(pillarId) ?? [];
  }
}

export async function loadCatalogFile(filePath: string): Promise<DefinitionCatalog> {
  const content = await readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogValidationError('CATALOG_INVALID_FILE', `Catalog file ${filePath} is not valid JSON: ${reason}`);
  }
  return DefinitionCatalog.fromJson(raw);
}

export async function loadCatalogFromSource(source: DefinitionSource): Promise<DefinitionCatalog> {
  const [metrics, pillars] = await Promise.all([
    source.loadMetricDefinitions(),
    source.loadPillarDefinitions()
  ]);
  return DefinitionCatalog.fromRecords(metrics, pillars);
}
