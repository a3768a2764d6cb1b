/**
 * In-process stand-in for every collaborator the orchestrator talks to.
 */

import type {
  CatalogCollaborator,
  InventoryCollaborator,
  ListSkusOptions,
  PriceCollaborator,
  QuotaCollaborator,
  QuotaUsage,
} from '../../src/collaborators/types.js';
import type {
  AdvisorHint,
  InstanceDescriptor,
  OsType,
  SkuDescriptor,
  UtilizationSummary,
} from '../../src/rightsizing/types.js';

export interface FakeCloudSeed {
  instances?: InstanceDescriptor[];
  hints?: AdvisorHint[];
  /** Region -> catalog */
  skus?: Record<string, SkuDescriptor[]>;
  /** `${sku}:${region}` -> hourly price */
  prices?: Record<string, number>;
  /** Instance name -> metrics returned by enrichMetrics */
  metrics?: Record<string, UtilizationSummary>;
  quotas?: Record<string, QuotaUsage[]>;
}

export interface FakeCloudCalls {
  listInstances: number;
  listAdvisorHints: number;
  enrichMetrics: number;
  listSkus: string[];
  getPrice: string[];
  getPrices: number;
  listQuotas: string[];
}

export class FakeCloud implements InventoryCollaborator, CatalogCollaborator, PriceCollaborator, QuotaCollaborator {
  readonly calls: FakeCloudCalls = {
    listInstances: 0,
    listAdvisorHints: 0,
    enrichMetrics: 0,
    listSkus: [],
    getPrice: [],
    getPrices: 0,
    listQuotas: [],
  };

  /** Regions whose catalog fetch rejects */
  readonly failingRegions = new Set<string>();
  /** Instance names whose metrics fetch rejects */
  readonly failingMetrics = new Set<string>();
  failInventory = false;
  /** Delay applied inside enrichMetrics, to hold instance tasks open */
  metricsDelayMs = 0;

  private activeMetrics = 0;
  maxConcurrentMetrics = 0;

  constructor(private readonly seed: FakeCloudSeed = {}) {}

  async listInstances(): Promise<InstanceDescriptor[]> {
    this.calls.listInstances++;
    if (this.failInventory) throw new Error('inventory unreachable');
    return (this.seed.instances ?? []).map(instance => ({ ...instance, metrics: { ...instance.metrics } }));
  }

  async listAdvisorHints(): Promise<AdvisorHint[]> {
    this.calls.listAdvisorHints++;
    return this.seed.hints ?? [];
  }

  async enrichMetrics(instance: InstanceDescriptor): Promise<void> {
    this.calls.enrichMetrics++;
    this.activeMetrics++;
    this.maxConcurrentMetrics = Math.max(this.maxConcurrentMetrics, this.activeMetrics);
    try {
      if (this.metricsDelayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.metricsDelayMs));
      }
      if (this.failingMetrics.has(instance.name)) throw new Error('metrics unavailable');
      const metrics = this.seed.metrics?.[instance.name];
      if (metrics) instance.metrics = { ...metrics };
    } finally {
      this.activeMetrics--;
    }
  }

  async listSkus(region: string, _options: ListSkusOptions): Promise<SkuDescriptor[]> {
    this.calls.listSkus.push(region);
    if (this.failingRegions.has(region)) throw new Error(`catalog unavailable in ${region}`);
    return this.seed.skus?.[region] ?? [];
  }

  async getPrice(sku: string, region: string, _os: OsType): Promise<number | undefined> {
    this.calls.getPrice.push(`${sku}:${region}`);
    return this.seed.prices?.[`${sku}:${region}`];
  }

  async getPrices(sku: string, regions: readonly string[], _os: OsType): Promise<Map<string, number>> {
    this.calls.getPrices++;
    const found = new Map<string, number>();
    for (const region of regions) {
      const price = this.seed.prices?.[`${sku}:${region}`];
      if (price !== undefined) found.set(region, price);
    }
    return found;
  }

  async listQuotas(region: string): Promise<QuotaUsage[]> {
    this.calls.listQuotas.push(region);
    return this.seed.quotas?.[region] ?? [];
  }
}
