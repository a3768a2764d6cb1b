/**
 * `rightsizer compare-regions <snapshot> --vm <name>`: price an instance's
 * SKU in its own region and every neighbouring one.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { SnapshotCloud } from '../../collaborators/snapshot.js';
import type { InventoryCollaborator, PriceCollaborator } from '../../collaborators/types.js';
import {
  compareRegionPrices,
  loadRegionAdjacency,
  type RegionAdjacency,
  type RegionPriceComparison,
} from '../../rightsizing/opportunities.js';
import { formatCurrency, formatPercent } from '../../report/format.js';

export interface CompareRegionsOptions {
  vm: string;
  resourceGroup?: string;
  json?: boolean;
}

export async function compareRegions(
  cloud: InventoryCollaborator & PriceCollaborator,
  vm: string,
  resourceGroup?: string,
  adjacency: RegionAdjacency = loadRegionAdjacency(),
): Promise<RegionPriceComparison> {
  const wanted = vm.toLowerCase();
  const instance = (await cloud.listInstances(resourceGroup)).find(entry => entry.name.toLowerCase() === wanted);
  if (!instance) {
    throw new Error(`VM '${vm}' not found`);
  }
  return compareRegionPrices(instance, adjacency, cloud);
}

export function formatComparison(comparison: RegionPriceComparison): string[] {
  const lines = [`🌍 ${comparison.sku} priced across regions`, ''];

  for (const row of comparison.rows) {
    const region = row.isCurrent ? `${row.region} ◄ current` : row.region;
    let savings = '-';
    if (!row.isCurrent) {
      savings = row.savings >= 0
        ? `${formatCurrency(row.savings)} (${formatPercent(row.savingsPercent)})`
        : `+${formatCurrency(-row.savings)} (+${formatPercent(-row.savingsPercent)})`;
    }
    lines.push(`${region.padEnd(28)} ${formatCurrency(row.hourly).padStart(8)}/h ${formatCurrency(row.monthly).padStart(12)}/mo  ${savings}`);
  }

  if (comparison.unpriced.length > 0) {
    lines.push('', `⚠️  No pricing found for: ${comparison.unpriced.join(', ')}`);
  }
  if (comparison.recommendation) {
    const { region, monthlySavings, annualSavings } = comparison.recommendation;
    lines.push('', `💡 Move to ${region} to save ${formatCurrency(monthlySavings)}/month (${formatCurrency(annualSavings)}/year)`);
  }
  return lines;
}

export function createCompareRegionsCommand(): Command {
  const cmd = new Command('compare-regions');

  cmd
    .description('Compare the price of a VM\'s SKU across neighbouring regions')
    .argument('<snapshot>', 'Snapshot file (YAML or JSON) with instances and prices')
    .requiredOption('--vm <name>', 'Instance name')
    .option('-g, --resource-group <name>', 'Resource group the instance belongs to')
    .option('--json', 'Output as JSON')
    .action(async (snapshot: string, options: CompareRegionsOptions) => {
      const cloud = SnapshotCloud.fromFile(resolve(snapshot));
      const comparison = await compareRegions(cloud, options.vm, options.resourceGroup);
      if (options.json) {
        console.log(JSON.stringify(comparison, null, 2));
        return;
      }
      console.log();
      for (const line of formatComparison(comparison)) {
        console.log(line ? `  ${line}` : '');
      }
    });

  return cmd;
}
