/**
 * `rightsizer rank-skus <snapshot>`: cheapest SKUs near a vCPU and memory
 * requirement, optionally ranked by the AI advisor for a workload.
 */

import { Command, Option } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { getLogger } from '../../core/logger.js';
import { toError } from '../../core/errors.js';
import { SnapshotCloud } from '../../collaborators/snapshot.js';
import type { CatalogCollaborator, PriceCollaborator } from '../../collaborators/types.js';
import type { AIRecommendationAdapter } from '../../ai/advisor.js';
import { getSkuVersion } from '../../rightsizing/classifier.js';
import { HOURS_PER_MONTH, type SkuDescriptor, type SkuRanking, type WorkloadProfile } from '../../rightsizing/types.js';
import { formatCurrency } from '../../report/format.js';
import { createAdvisor, parsePositiveInt, parsePositiveNumber } from './analyze.js';

/** Matching SKUs may be this much smaller or larger than asked for */
export const LOWER_TOLERANCE = 0.8;
export const UPPER_TOLERANCE = 1.5;

export interface RankSkusOptions {
  vcpus: number;
  memory: number;
  region: string;
  os: WorkloadProfile['osType'];
  top: number;
  workload?: string;
  ai?: boolean;
  dir: string;
  json?: boolean;
}

export interface PricedSku {
  sku: SkuDescriptor;
  hourly: number;
  monthly: number;
}

function within(value: number, wanted: number): boolean {
  return value >= wanted * LOWER_TOLERANCE && value <= wanted * UPPER_TOLERANCE;
}

/**
 * Unrestricted, priced SKUs within tolerance of the profile, cheapest first.
 */
export async function matchSkus(
  cloud: CatalogCollaborator & PriceCollaborator,
  profile: WorkloadProfile,
): Promise<PricedSku[]> {
  const skus = await cloud.listSkus(profile.region, { includeRestricted: false });
  const matches: PricedSku[] = [];

  for (const sku of skus) {
    if (!within(sku.vcpus, profile.vcpus) || !within(sku.memoryGb, profile.memoryGb)) continue;
    const hourly = await cloud.getPrice(sku.name, profile.region, profile.osType);
    if (!hourly) continue;
    matches.push({ sku, hourly, monthly: hourly * HOURS_PER_MONTH });
  }

  return matches.sort((a, b) => a.hourly - b.hourly);
}

/** Cheapest match on the newest hardware version present */
export function newestGeneration(matches: readonly PricedSku[]): PricedSku | undefined {
  const newest = Math.max(0, ...matches.map(match => getSkuVersion(match.sku.name)));
  return matches.find(match => getSkuVersion(match.sku.name) === newest);
}

/**
 * AI ranking of the listed SKUs. A failed call is logged and yields no rankings.
 */
export async function rankWithAdvisor(
  advisor: AIRecommendationAdapter,
  profile: WorkloadProfile,
  matches: readonly PricedSku[],
): Promise<SkuRanking[]> {
  const prices = new Map(matches.map(match => [match.sku.name, match.hourly]));
  try {
    return await advisor.rankSkus(profile, matches.map(match => match.sku), prices);
  } catch (err) {
    const error = toError(err);
    getLogger().warn({ provider: advisor.providerName, error: error.message }, 'AI ranking failed');
    return [];
  }
}

export function formatMatches(profile: WorkloadProfile, matches: readonly PricedSku[], top: number): string[] {
  const shown = matches.slice(0, top);
  const lines = [`📊 Top ${shown.length} SKUs for ${profile.vcpus} vCPUs / ${profile.memoryGb} GB in ${profile.region}`, ''];

  shown.forEach((match, index) => {
    const features = match.sku.features.length > 0 ? match.sku.features.slice(0, 2).join(', ') : '-';
    lines.push(
      `${String(index + 1).padStart(2)}. ${match.sku.name.padEnd(28)} ${String(match.sku.vcpus).padStart(3)} vCPUs `
      + `${String(match.sku.memoryGb).padStart(6)} GB  ${formatCurrency(match.hourly).padStart(8)}/h `
      + `${formatCurrency(match.monthly).padStart(12)}/mo  ${features}`,
    );
  });

  const cheapest = matches[0];
  const newest = newestGeneration(matches);
  if (cheapest) {
    lines.push('', `💡 Cheapest option: ${cheapest.sku.name} at ${formatCurrency(cheapest.monthly)}/month`);
    lines.push(`   Total options found: ${matches.length}`);
  }
  if (newest) {
    lines.push(`   Newest generation: ${newest.sku.name} at ${formatCurrency(newest.monthly)}/month`);
  }
  return lines;
}

export function formatRankings(rankings: readonly SkuRanking[]): string[] {
  const lines = ['🤖 AI ranking', ''];
  for (const ranking of rankings) {
    lines.push(`${String(ranking.rank).padStart(2)}. ${ranking.sku.padEnd(28)} score ${ranking.score}  ${ranking.bestFor}`);
  }
  return lines;
}

export function createRankSkusCommand(): Command {
  const cmd = new Command('rank-skus');

  cmd
    .description('Rank SKUs near a vCPU and memory requirement by price')
    .argument('<snapshot>', 'Snapshot file (YAML or JSON) with SKU catalogs and prices')
    .requiredOption('-c, --vcpus <n>', 'Required vCPUs', parsePositiveInt)
    .requiredOption('-m, --memory <gb>', 'Required memory in GB', parsePositiveNumber)
    .requiredOption('-r, --region <region>', 'Region')
    .addOption(new Option('--os <os>', 'Operating system').choices(['Linux', 'Windows']).default('Linux'))
    .option('-t, --top <n>', 'Number of SKUs to show', parsePositiveInt, 15)
    .option('--workload <description>', 'Workload description for the AI ranking')
    .option('--ai', 'Ask the AI advisor to rank the listed SKUs')
    .option('-d, --dir <directory>', 'Project directory for .rightsizer.yaml', '.')
    .option('--json', 'Output as JSON')
    .action(async (snapshot: string, options: RankSkusOptions) => {
      const cloud = SnapshotCloud.fromFile(resolve(snapshot));
      const profile: WorkloadProfile = {
        vcpus: options.vcpus,
        memoryGb: options.memory,
        region: options.region,
        osType: options.os,
        workload: options.workload,
      };

      const matches = await matchSkus(cloud, profile);
      const shown = matches.slice(0, options.top);

      let rankings: SkuRanking[] = [];
      if (options.ai && shown.length > 0) {
        const advisor = createAdvisor(new ConfigManager(resolve(options.dir)).load());
        if (advisor) {
          rankings = await rankWithAdvisor(advisor, profile, shown);
        } else if (!options.json) {
          console.log('\n  ⚠️  No AI provider API key configured, skipping AI ranking');
        }
      }

      if (options.json) {
        console.log(JSON.stringify({ profile, matches: shown, total: matches.length, rankings }, null, 2));
        return;
      }

      if (matches.length === 0) {
        console.log('\n  No matching SKUs found. Try adjusting the requirements.\n');
        return;
      }

      console.log();
      for (const line of formatMatches(profile, matches, options.top)) {
        console.log(line ? `  ${line}` : '');
      }
      if (rankings.length > 0) {
        console.log();
        for (const line of formatRankings(rankings)) {
          console.log(line ? `  ${line}` : '');
        }
      }
      console.log();
    });

  return cmd;
}
