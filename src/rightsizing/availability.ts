/**
 * Per-region SKU availability and look-alike alternatives for SKUs that
 * cannot be deployed where they were asked for.
 */

import { getLogger } from '../core/logger.js';
import type { SkuCatalogCache } from './cache.js';
import type { SkuDescriptor } from './types.js';

/** Alternatives below this similarity are not worth suggesting */
export const MIN_SIMILARITY = 60;
export const MAX_ALTERNATIVES = 5;

/** Specifications compared one-for-one when scoring similarity */
const SIMILARITY_KEYS: ReadonlyArray<(sku: SkuDescriptor) => number | boolean> = [
  sku => sku.vcpus,
  sku => sku.memoryGb,
  sku => sku.maxDataDisks,
  sku => sku.features.includes('PremiumStorage'),
  sku => sku.features.includes('AcceleratedNetworking'),
];

export interface SimilarSku {
  name: string;
  family: string;
  vcpus: number;
  memoryGb: number;
  /** 0-100, share of compared specifications that match exactly */
  similarity: number;
  availableZones: string[];
}

export interface SimilarSkuOptions {
  maxResults?: number;
  minSimilarity?: number;
}

export interface SkuAvailability {
  sku: string;
  region: string;
  isAvailable: boolean;
  restrictionReason?: string;
  availableZones: string[];
  specifications?: SkuDescriptor;
  alternatives: SimilarSku[];
}

export interface AvailabilityOptions extends SimilarSkuOptions {
  /** Look for alternatives when the SKU is restricted in the region */
  findAlternatives?: boolean;
}

function locationRestriction(sku: SkuDescriptor): string | undefined {
  return sku.restrictions.find(restriction => restriction.kind === 'Location')?.reasonCode;
}

export function calculateSimilarity(a: SkuDescriptor, b: SkuDescriptor): number {
  const matches = SIMILARITY_KEYS.filter(key => key(a) === key(b)).length;
  return Math.floor(matches * 100 / SIMILARITY_KEYS.length);
}

/**
 * Unrestricted SKUs from the same regional catalog that look like `target`,
 * most similar first. Ties keep catalog order.
 */
export function findSimilarSkus(
  target: SkuDescriptor,
  catalog: readonly SkuDescriptor[],
  options: SimilarSkuOptions = {},
): SimilarSku[] {
  const { maxResults = MAX_ALTERNATIVES, minSimilarity = MIN_SIMILARITY } = options;
  const similar: SimilarSku[] = [];

  for (const sku of catalog) {
    if (sku.name === target.name || locationRestriction(sku) !== undefined) continue;

    const similarity = calculateSimilarity(target, sku);
    if (similarity < minSimilarity) continue;

    similar.push({
      name: sku.name,
      family: sku.family,
      vcpus: sku.vcpus,
      memoryGb: sku.memoryGb,
      similarity,
      availableZones: [...sku.availableZones],
    });
  }

  return similar.sort((a, b) => b.similarity - a.similarity).slice(0, maxResults);
}

/**
 * Whether `sku` can be deployed in `region`, with its zones and, when it
 * cannot, the closest unrestricted alternatives.
 */
export async function checkSkuAvailability(
  catalog: SkuCatalogCache,
  sku: string,
  region: string,
  options: AvailabilityOptions = {},
): Promise<SkuAvailability> {
  const skus = await catalog.get(region);
  const wanted = sku.toLowerCase();
  const target = skus.find(entry => entry.name.toLowerCase() === wanted);

  if (!target) {
    getLogger().warn({ sku, region }, 'SKU not found in region');
    return { sku, region, isAvailable: false, restrictionReason: 'SKU not found in region', availableZones: [], alternatives: [] };
  }

  const restrictionReason = locationRestriction(target);
  const isAvailable = restrictionReason === undefined;
  const alternatives = !isAvailable && options.findAlternatives !== false
    ? findSimilarSkus(target, skus, options)
    : [];

  return {
    sku: target.name,
    region,
    isAvailable,
    restrictionReason,
    availableZones: [...target.availableZones],
    specifications: target,
    alternatives,
  };
}

/** One SKU across several regions, in the order given, without alternatives */
export async function checkSkuAcrossRegions(
  catalog: SkuCatalogCache,
  sku: string,
  regions: readonly string[],
): Promise<SkuAvailability[]> {
  const results: SkuAvailability[] = [];
  for (const region of regions) {
    results.push(await checkSkuAvailability(catalog, sku, region, { findAlternatives: false }));
  }
  return results;
}
