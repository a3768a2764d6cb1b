/**
 * `rightsizer check-availability-multi <snapshot>`: one SKU across several regions.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { SnapshotCloud } from '../../collaborators/snapshot.js';
import type { CatalogCollaborator } from '../../collaborators/types.js';
import { SkuCatalogCache } from '../../rightsizing/cache.js';
import { checkSkuAcrossRegions, type SkuAvailability } from '../../rightsizing/availability.js';
import { parseList } from './analyze.js';

export const DEFAULT_REGIONS = ['eastus', 'eastus2', 'westus2', 'westeurope', 'northeurope'];

export interface CheckAvailabilityOptions {
  sku: string;
  regions: string[];
  json?: boolean;
}

export function checkAvailability(catalog: CatalogCollaborator, options: CheckAvailabilityOptions): Promise<SkuAvailability[]> {
  return checkSkuAcrossRegions(new SkuCatalogCache(catalog), options.sku, options.regions);
}

export function formatAvailability(results: readonly SkuAvailability[]): string[] {
  const lines = results.map(result => {
    const region = result.region.padEnd(20);
    if (!result.isAvailable) return `❌ ${region} ${result.restrictionReason ?? 'Restricted'}`;
    const zones = result.availableZones.length > 0 ? `zones ${result.availableZones.join(', ')}` : 'no zones';
    return `✅ ${region} ${zones}`;
  });
  const available = results.filter(result => result.isAvailable).length;
  lines.push('', `Available in ${available} of ${results.length} regions`);
  return lines;
}

export function createCheckAvailabilityCommand(): Command {
  const cmd = new Command('check-availability-multi');

  cmd
    .description('Check one SKU for restrictions and zones across several regions')
    .argument('<snapshot>', 'Snapshot file (YAML or JSON) with SKU catalogs')
    .requiredOption('-k, --sku <name>', 'SKU name, e.g. Standard_E8s_v5')
    .option('-r, --regions <list>', 'Regions to check, comma-separated', parseList, DEFAULT_REGIONS)
    .option('--json', 'Output as JSON')
    .action(async (snapshot: string, options: CheckAvailabilityOptions) => {
      const cloud = SnapshotCloud.fromFile(resolve(snapshot));
      const results = await checkAvailability(cloud, options);
      if (options.json) {
        console.log(JSON.stringify(results, null, 2));
        return;
      }
      console.log(`\n  ${options.sku}\n`);
      for (const line of formatAvailability(results)) {
        console.log(line ? `  ${line}` : '');
      }
    });

  return cmd;
}
