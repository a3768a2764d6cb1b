/**
 * Non-scoring savings opportunities: newer-generation replacements and
 * cheaper neighbouring regions for the same SKU.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { normalizeRegion, type SkuCatalogCache } from './cache.js';
import { getSkuVersion } from './classifier.js';
import type { PriceCollaborator } from '../collaborators/types.js';
import { HOURS_PER_MONTH, type InstanceDescriptor, type RegionAlternative } from './types.js';

export type GenerationMap = Readonly<Record<string, string>>;
export type RegionAdjacency = Readonly<Record<string, readonly string[]>>;

const GenerationMapSchema = z.record(z.string());
const RegionAdjacencySchema = z.record(z.array(z.string()));

const moduleDir = dirname(fileURLToPath(import.meta.url));

// Source tree and dist/ sit at different depths below the package root
const DATA_DIRS = [join(moduleDir, '..', '..', 'data'), join(moduleDir, '..', '..', '..', 'data')];

function readDataFile<T>(file: string, schema: z.ZodType<T>): T {
  const path = DATA_DIRS.map(dir => join(dir, file)).find(candidate => existsSync(candidate));
  if (!path) {
    throw new ConfigError(`Data file ${file} not found`);
  }
  const parsed = schema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
  if (!parsed.success) {
    throw new ConfigError(`Invalid data file ${path}: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

let generationMap: GenerationMap | undefined;
let regionAdjacency: RegionAdjacency | undefined;

/** Old SKU name (or name prefix) -> current-generation replacement */
export function loadGenerationMap(): GenerationMap {
  generationMap ??= readDataFile('generation-map.json', GenerationMapSchema);
  return generationMap;
}

/** Region -> nearby regions worth price-comparing */
export function loadRegionAdjacency(): RegionAdjacency {
  regionAdjacency ??= readDataFile('region-alternatives.json', RegionAdjacencySchema);
  return regionAdjacency;
}

/**
 * Replacement for a SKU: exact key, otherwise the longest key the name extends
 * at a `_` boundary (`Standard_D2_v2_Promo` -> `Standard_D2_v2`).
 */
export function findGenerationTarget(sku: string, map: GenerationMap): string | undefined {
  if (Object.hasOwn(map, sku)) return map[sku];

  let best: string | undefined;
  for (const key of Object.keys(map)) {
    if (sku.startsWith(`${key}_`) && (best === undefined || key.length > best.length)) {
      best = key;
    }
  }
  return best === undefined ? undefined : map[best];
}

export interface GenerationUpgrade {
  target: string;
  monthlyPrice: number;
  savings: number;
}

/**
 * Propose the mapped SKU only when it is a newer hardware revision, the
 * region offers it, and it is strictly cheaper than the current monthly cost.
 */
export async function evaluateGenerationUpgrade(
  instance: InstanceDescriptor,
  map: GenerationMap,
  catalog: SkuCatalogCache,
  priceOf: (sku: string) => Promise<number | undefined>,
): Promise<GenerationUpgrade | undefined> {
  const target = findGenerationTarget(instance.sku, map);
  if (!target || getSkuVersion(target) <= getSkuVersion(instance.sku)) return undefined;

  const skus = await catalog.get(instance.region);
  if (!skus.some(sku => sku.name === target)) return undefined;

  const hourly = await priceOf(target);
  if (!hourly) return undefined;

  const current = instance.priceMonthly ?? 0;
  const monthlyPrice = hourly * HOURS_PER_MONTH;
  if (monthlyPrice >= current) return undefined;

  return { target, monthlyPrice, savings: current - monthlyPrice };
}

/**
 * Adjacent regions where the same SKU is cheaper, best savings first.
 */
export async function evaluateRegionAlternatives(
  instance: InstanceDescriptor,
  adjacency: RegionAdjacency,
  prices: PriceCollaborator,
): Promise<RegionAlternative[]> {
  const current = instance.priceMonthly ?? 0;
  if (current <= 0) return [];

  const neighbours = adjacency[normalizeRegion(instance.region)] ?? [];
  if (neighbours.length === 0) return [];

  const found = await prices.getPrices(instance.sku, neighbours, instance.osType);
  const cheaper: RegionAlternative[] = [];
  for (const [region, hourly] of found) {
    const monthlyPrice = hourly * HOURS_PER_MONTH;
    const savings = current - monthlyPrice;
    if (savings > 0) cheaper.push({ region, monthlyPrice, savings });
  }

  return cheaper.sort((a, b) => b.savings - a.savings);
}

export interface RegionPriceRow {
  region: string;
  hourly: number;
  monthly: number;
  /** Against the current region; negative when this region costs more */
  savings: number;
  savingsPercent: number;
  isCurrent: boolean;
}

export interface RegionPriceComparison {
  sku: string;
  currentRegion: string;
  currentMonthly: number;
  /** Priced regions, cheapest first */
  rows: RegionPriceRow[];
  unpriced: string[];
  /** Cheapest region when it is not the current one */
  recommendation?: { region: string; monthlySavings: number; annualSavings: number };
}

/**
 * Price of an instance's SKU in its own region and every neighbour.
 */
export async function compareRegionPrices(
  instance: Pick<InstanceDescriptor, 'sku' | 'region' | 'osType'>,
  adjacency: RegionAdjacency,
  prices: PriceCollaborator,
): Promise<RegionPriceComparison> {
  const currentRegion = normalizeRegion(instance.region);
  const regions = [currentRegion, ...(adjacency[currentRegion] ?? []).map(normalizeRegion)];
  const found = await prices.getPrices(instance.sku, regions, instance.osType);
  const currentHourly = found.get(currentRegion);
  const currentMonthly = currentHourly === undefined ? 0 : currentHourly * HOURS_PER_MONTH;

  const rows: RegionPriceRow[] = [];
  const unpriced: string[] = [];
  for (const region of regions) {
    const hourly = found.get(region);
    if (hourly === undefined || hourly <= 0) {
      unpriced.push(region);
      continue;
    }
    const monthly = hourly * HOURS_PER_MONTH;
    const savings = currentMonthly - monthly;
    rows.push({
      region,
      hourly,
      monthly,
      savings,
      savingsPercent: currentMonthly > 0 ? savings / currentMonthly * 100 : 0,
      isCurrent: region === currentRegion,
    });
  }
  rows.sort((a, b) => a.monthly - b.monthly);

  const cheapest = rows[0];
  const recommendation = cheapest && !cheapest.isCurrent && currentMonthly > 0 && cheapest.savings > 0
    ? { region: cheapest.region, monthlySavings: cheapest.savings, annualSavings: cheapest.savings * 12 }
    : undefined;

  return { sku: instance.sku, currentRegion, currentMonthly, rows, unpriced, recommendation };
}
