/**
 * Offline collaborator backed by a YAML or JSON snapshot of an estate:
 * instances with their utilization, advisor hints, raw SKU catalogs,
 * hourly prices and quota usage, keyed by region.
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { CollaboratorError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { normalizeRegion } from '../rightsizing/cache.js';
import type { AdvisorHint, InstanceDescriptor, OsType, SkuDescriptor } from '../rightsizing/types.js';
import { RawSkuRecordSchema, isRestricted, mapSkuCapabilities } from './sku-mapper.js';
import type {
  CatalogCollaborator,
  InventoryCollaborator,
  ListSkusOptions,
  PriceCollaborator,
  QuotaCollaborator,
  QuotaUsage,
} from './types.js';

const MetricsSchema = z.object({
  avgCpu: z.number().optional(),
  maxCpu: z.number().optional(),
  avgMemory: z.number().optional(),
  maxMemory: z.number().optional(),
  avgDiskIops: z.number().optional(),
  avgNetworkIn: z.number().optional(),
  avgNetworkOut: z.number().optional(),
});

const InstanceSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1),
  resourceGroup: z.string().default(''),
  region: z.string().min(1),
  sku: z.string().min(1),
  osType: z.enum(['Linux', 'Windows']).default('Linux'),
  powerState: z.string().default('running'),
  tags: z.record(z.string()).default({}),
  dataDiskCount: z.number().int().min(0).default(0),
  nicCount: z.number().int().min(0).default(1),
  metrics: MetricsSchema.default({}),
});

const AdvisorHintSchema = z.object({
  id: z.string().optional(),
  instanceName: z.string(),
  resourceGroup: z.string().default(''),
  category: z.string().default('Cost'),
  impact: z.string().default('Medium'),
  problem: z.string().default(''),
  solution: z.string().default(''),
  currentSku: z.string().optional(),
  recommendedSku: z.string().optional(),
  estimatedSavings: z.number().optional(),
});

/** A bare number prices every OS the same */
const PriceEntrySchema = z.union([
  z.number().nonnegative(),
  z.object({ Linux: z.number().nonnegative().optional(), Windows: z.number().nonnegative().optional() }),
]);

export const SnapshotSchema = z.object({
  scope: z.string().optional(),
  instances: z.array(InstanceSchema).default([]),
  advisorHints: z.array(AdvisorHintSchema).default([]),
  skus: z.record(z.array(RawSkuRecordSchema)).default({}),
  prices: z.record(z.record(PriceEntrySchema)).default({}),
  quotas: z.record(z.array(z.object({
    family: z.string(),
    used: z.number().min(0),
    limit: z.number().min(0),
  }))).default({}),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;
export type SnapshotInput = z.input<typeof SnapshotSchema>;

function byRegion<T>(record: Record<string, T>): Map<string, T> {
  return new Map(Object.entries(record).map(([region, value]) => [normalizeRegion(region), value]));
}

export class SnapshotCloud implements InventoryCollaborator, CatalogCollaborator, PriceCollaborator, QuotaCollaborator {
  private readonly snapshot: Snapshot;
  private readonly skus: Map<string, Snapshot['skus'][string]>;
  private readonly prices: Map<string, Snapshot['prices'][string]>;
  private readonly quotas: Map<string, QuotaUsage[]>;
  private logger = getLogger();

  constructor(input: SnapshotInput) {
    this.snapshot = SnapshotCloud.validate(input);
    this.skus = byRegion(this.snapshot.skus);
    this.prices = byRegion(this.snapshot.prices);
    this.quotas = byRegion(this.snapshot.quotas);
  }

  static fromFile(path: string): SnapshotCloud {
    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new CollaboratorError(`Failed to read snapshot ${path}`, 'snapshot', 'discover', toError(err));
    }
    return new SnapshotCloud(SnapshotCloud.validate(raw ?? {}));
  }

  static validate(input: unknown): Snapshot {
    const parsed = SnapshotSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new CollaboratorError(`Invalid snapshot: ${issues}`, 'snapshot', 'discover', parsed.error);
    }
    return parsed.data;
  }

  get scope(): string | undefined {
    return this.snapshot.scope;
  }

  async listInstances(scope?: string): Promise<InstanceDescriptor[]> {
    const wanted = scope?.toLowerCase();
    return this.snapshot.instances
      .filter(instance => !wanted || instance.resourceGroup.toLowerCase() === wanted)
      .map(instance => ({
        id: instance.id ?? `${instance.resourceGroup}/${instance.name}`,
        name: instance.name,
        resourceGroup: instance.resourceGroup,
        region: instance.region,
        sku: instance.sku,
        osType: instance.osType,
        tags: { ...instance.tags },
        powerState: instance.powerState,
        metrics: {},
        dataDiskCount: instance.dataDiskCount,
        nicCount: instance.nicCount,
      }));
  }

  async listAdvisorHints(scope?: string): Promise<AdvisorHint[]> {
    const wanted = scope?.toLowerCase();
    return this.snapshot.advisorHints
      .filter(hint => !wanted || hint.resourceGroup.toLowerCase() === wanted)
      .map((hint, index) => ({ ...hint, id: hint.id ?? `hint-${index + 1}` }));
  }

  async enrichMetrics(instance: InstanceDescriptor, lookbackDays: number): Promise<void> {
    const source = this.snapshot.instances.find(entry => entry.name === instance.name);
    if (!source) return;
    instance.metrics = { ...source.metrics };
    this.logger.debug({ instance: instance.name, lookbackDays }, 'Metrics loaded from snapshot');
  }

  async listSkus(region: string, options: ListSkusOptions): Promise<SkuDescriptor[]> {
    const records = this.skus.get(normalizeRegion(region)) ?? [];
    const skus: SkuDescriptor[] = [];
    for (const record of records) {
      const sku = mapSkuCapabilities(record, region);
      if (!sku) continue;
      if (!options.includeRestricted && isRestricted(sku)) continue;
      skus.push(sku);
    }
    return skus;
  }

  async getPrice(sku: string, region: string, os: OsType): Promise<number | undefined> {
    const entry = this.prices.get(normalizeRegion(region))?.[sku];
    if (entry === undefined) return undefined;
    return typeof entry === 'number' ? entry : entry[os];
  }

  async getPrices(sku: string, regions: readonly string[], os: OsType): Promise<Map<string, number>> {
    const found = new Map<string, number>();
    for (const region of regions) {
      const price = await this.getPrice(sku, region, os);
      if (price !== undefined) found.set(normalizeRegion(region), price);
    }
    return found;
  }

  async listQuotas(region: string): Promise<QuotaUsage[]> {
    return [...(this.quotas.get(normalizeRegion(region)) ?? [])];
  }
}
