import type {
  AdvisorHint,
  AnalysisReport,
  InstanceDescriptor,
  OsType,
  SkuDescriptor,
} from '../rightsizing/types.js';

/**
 * Source of the instance estate and its utilization history.
 */
export interface InventoryCollaborator {
  listInstances(scope?: string): Promise<InstanceDescriptor[]>;
  listAdvisorHints(scope?: string): Promise<AdvisorHint[]>;
  /** Fill `instance.metrics` in place from the last `lookbackDays` of history */
  enrichMetrics(instance: InstanceDescriptor, lookbackDays: number): Promise<void>;
}

export interface ListSkusOptions {
  includeRestricted: boolean;
}

export interface CatalogCollaborator {
  listSkus(region: string, options: ListSkusOptions): Promise<SkuDescriptor[]>;
}

export interface PriceCollaborator {
  /** Hourly pay-as-you-go price, undefined when the SKU has no price there */
  getPrice(sku: string, region: string, os: OsType): Promise<number | undefined>;
  /** Hourly prices across regions; regions without a price are absent from the map */
  getPrices(sku: string, regions: readonly string[], os: OsType): Promise<Map<string, number>>;
}

export interface QuotaUsage {
  /** Display name of the quota, e.g. "Standard DSv5 Family vCPUs" */
  family: string;
  used: number;
  limit: number;
}

export interface QuotaCollaborator {
  listQuotas(region: string): Promise<QuotaUsage[]>;
}

export type ReportFormat = 'json' | 'csv';

export interface ReportSink {
  readonly format: ReportFormat;
  write(report: AnalysisReport): Promise<void>;
}
