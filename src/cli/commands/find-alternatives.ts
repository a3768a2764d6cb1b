/**
 * `rightsizer find-alternatives <snapshot>`: unrestricted SKUs similar to a
 * target SKU in the same region.
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { SnapshotCloud } from '../../collaborators/snapshot.js';
import type { CatalogCollaborator } from '../../collaborators/types.js';
import { SkuCatalogCache } from '../../rightsizing/cache.js';
import {
  MIN_SIMILARITY,
  checkSkuAvailability,
  findSimilarSkus,
  type SimilarSku,
  type SkuAvailability,
} from '../../rightsizing/availability.js';
import { parsePositiveInt } from './analyze.js';

export interface FindAlternativesOptions {
  sku: string;
  region: string;
  max: number;
  minSimilarity: number;
  json?: boolean;
}

export interface AlternativesResult {
  target: SkuAvailability;
  alternatives: SimilarSku[];
}

function parsePercent(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError('Expected an integer from 0 to 100.');
  }
  return parsed;
}

/**
 * Alternatives are listed whether or not the target itself is available.
 */
export async function findAlternatives(
  catalog: CatalogCollaborator,
  options: FindAlternativesOptions,
): Promise<AlternativesResult> {
  const cache = new SkuCatalogCache(catalog);
  const target = await checkSkuAvailability(cache, options.sku, options.region, { findAlternatives: false });
  if (!target.specifications) return { target, alternatives: [] };

  const alternatives = findSimilarSkus(target.specifications, await cache.get(options.region), {
    maxResults: options.max,
    minSimilarity: options.minSimilarity,
  });
  return { target, alternatives };
}

export function formatAlternatives(result: AlternativesResult, minSimilarity: number): string[] {
  const { target, alternatives } = result;
  const specs = target.specifications
    ? `${target.specifications.vcpus} vCPUs, ${target.specifications.memoryGb} GB`
    : 'not found';
  const lines = [
    `🎯 ${target.sku} in ${target.region}: ${specs}, ${target.isAvailable ? 'available' : 'not available'}`,
    '',
  ];

  if (alternatives.length === 0) {
    lines.push(`No alternatives found with ≥${minSimilarity}% similarity`);
    return lines;
  }

  alternatives.forEach((alternative, index) => {
    const zones = alternative.availableZones.length > 0 ? alternative.availableZones.join(', ') : 'All';
    lines.push(
      `${String(index + 1).padStart(2)}. ${alternative.name.padEnd(28)} ${String(alternative.vcpus).padStart(3)} vCPUs `
      + `${String(alternative.memoryGb).padStart(6)} GB  ${String(alternative.similarity).padStart(3)}%  zones ${zones}`,
    );
  });
  return lines;
}

export function createFindAlternativesCommand(): Command {
  const cmd = new Command('find-alternatives');

  cmd
    .description('List unrestricted SKUs similar to a target SKU in a region')
    .argument('<snapshot>', 'Snapshot file (YAML or JSON) with SKU catalogs')
    .requiredOption('-k, --sku <name>', 'Target SKU name')
    .requiredOption('-r, --region <region>', 'Region to search')
    .option('-m, --max <n>', 'Maximum alternatives to show', parsePositiveInt, 10)
    .option('--min-similarity <percent>', 'Minimum similarity percentage', parsePercent, MIN_SIMILARITY)
    .option('--json', 'Output as JSON')
    .action(async (snapshot: string, options: FindAlternativesOptions) => {
      const cloud = SnapshotCloud.fromFile(resolve(snapshot));
      const result = await findAlternatives(cloud, options);
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      console.log();
      for (const line of formatAlternatives(result, options.minSimilarity)) {
        console.log(line ? `  ${line}` : '');
      }
    });

  return cmd;
}
