/**
 * Run-scoped caches for the regional SKU catalog and per-SKU prices.
 *
 * Both are insert-only for the lifetime of a run. Fills go through a
 * per-cache mutex so concurrent instance tasks never fetch the same key
 * twice; reads of an existing entry need no lock.
 */

import { AsyncMutex } from '../core/mutex.js';
import type { CatalogCollaborator, PriceCollaborator } from '../collaborators/types.js';
import type { OsType, SkuDescriptor } from './types.js';

export function normalizeRegion(region: string): string {
  return region.toLowerCase().replace(/\s+/g, '');
}

export class SkuCatalogCache {
  private entries = new Map<string, readonly SkuDescriptor[]>();
  private mutex = new AsyncMutex();

  constructor(private readonly catalog: CatalogCollaborator) {}

  /**
   * Catalog for a region (restricted SKUs included), fetched on first use.
   */
  async get(region: string): Promise<readonly SkuDescriptor[]> {
    const key = normalizeRegion(region);
    const cached = this.entries.get(key);
    if (cached) return cached;

    return this.mutex.withLock(async () => {
      const existing = this.entries.get(key);
      if (existing) return existing;

      const skus = Object.freeze(await this.catalog.listSkus(key, { includeRestricted: true }));
      this.entries.set(key, skus);
      return skus;
    });
  }

  peek(region: string): readonly SkuDescriptor[] | undefined {
    return this.entries.get(normalizeRegion(region));
  }

  has(region: string): boolean {
    return this.entries.has(normalizeRegion(region));
  }

  get size(): number {
    return this.entries.size;
  }
}

export class PriceCache {
  private entries = new Map<string, number>();
  private mutex = new AsyncMutex();

  constructor(private readonly prices: PriceCollaborator) {}

  static key(sku: string, region: string, os: OsType): string {
    return `${sku}:${normalizeRegion(region)}:${os}`;
  }

  /**
   * Hourly price. Misses are not stored, so an unknown price is queried again next time.
   */
  async get(sku: string, region: string, os: OsType): Promise<number | undefined> {
    const key = PriceCache.key(sku, region, os);
    const cached = this.entries.get(key);
    if (cached !== undefined) return cached;

    return this.mutex.withLock(async () => {
      const existing = this.entries.get(key);
      if (existing !== undefined) return existing;

      const price = await this.prices.getPrice(sku, normalizeRegion(region), os);
      if (price !== undefined) this.entries.set(key, price);
      return price;
    });
  }

  async getMany(skus: readonly string[], region: string, os: OsType): Promise<Map<string, number>> {
    const found = new Map<string, number>();
    for (const sku of skus) {
      const price = await this.get(sku, region, os);
      if (price !== undefined) found.set(sku, price);
    }
    return found;
  }

  peek(sku: string, region: string, os: OsType): number | undefined {
    return this.entries.get(PriceCache.key(sku, region, os));
  }

  get size(): number {
    return this.entries.size;
  }
}
