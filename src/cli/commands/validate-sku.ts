/**
 * `rightsizer validate-sku <snapshot>`: check whether one SKU can be
 * deployed in a region (restrictions, quota, zones, features).
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { SnapshotCloud } from '../../collaborators/snapshot.js';
import type { CatalogCollaborator, QuotaCollaborator } from '../../collaborators/types.js';
import { SkuCatalogCache } from '../../rightsizing/cache.js';
import { QuotaBackedValidator } from '../../rightsizing/validator.js';
import { SKU_FEATURES, type SkuFeature, type ValidationOutcome } from '../../rightsizing/types.js';
import { parseList } from './analyze.js';

export interface ValidateSkuOptions {
  sku: string;
  region: string;
  vcpus: number;
  zones?: string[];
  features?: SkuFeature[];
  json?: boolean;
}

export function parseFeatures(value: string): SkuFeature[] {
  return parseList(value).map(name => {
    const wanted = name.toLowerCase();
    const feature = SKU_FEATURES.find(candidate => candidate.toLowerCase() === wanted);
    if (!feature) {
      throw new InvalidArgumentError(`Unknown feature "${name}". Expected one of: ${SKU_FEATURES.join(', ')}.`);
    }
    return feature;
  });
}

function parseVcpus(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function validateSku(
  cloud: CatalogCollaborator & QuotaCollaborator,
  options: ValidateSkuOptions,
): Promise<ValidationOutcome> {
  const validator = new QuotaBackedValidator(new SkuCatalogCache(cloud), cloud);
  return validator.validate({
    sku: options.sku,
    region: options.region,
    requiredVcpus: options.vcpus,
    requiredFeatures: options.features ?? [],
    requiredZones: options.zones,
  });
}

export function formatValidation(sku: string, region: string, outcome: ValidationOutcome): string[] {
  const lines = outcome.isValid
    ? [`✅ ${sku} can be deployed in ${region}`]
    : [`❌ ${sku} cannot be deployed in ${region}`];

  for (const restriction of outcome.restrictions) {
    lines.push(`   • ${restriction}`);
  }
  if (outcome.quota) {
    const { family, used, limit, available, usagePercent } = outcome.quota;
    lines.push(`   Quota: ${family} ${used}/${limit} (${available} available, ${usagePercent.toFixed(1)}% used)`);
  }
  if (outcome.zones) {
    lines.push(`   Zones: ${outcome.zones.available.length > 0 ? outcome.zones.available.join(', ') : 'none'}`);
  }
  for (const warning of outcome.warnings) {
    lines.push(`   ⚠️  ${warning}`);
  }
  return lines;
}

export function createValidateSkuCommand(): Command {
  const cmd = new Command('validate-sku');

  cmd
    .description('Check restrictions, quota, zones and features for one SKU in a region')
    .argument('<snapshot>', 'Snapshot file (YAML or JSON) with SKUs and quotas')
    .requiredOption('-k, --sku <name>', 'SKU name, e.g. Standard_D4s_v5')
    .requiredOption('-r, --region <region>', 'Region to deploy into')
    .option('-c, --vcpus <n>', 'vCPUs needed, checked against quota', parseVcpus, 0)
    .option('-z, --zones <list>', 'Required zones, comma-separated', parseList)
    .option('-f, --features <list>', 'Required features, comma-separated', parseFeatures)
    .option('--json', 'Output as JSON')
    .action(async (snapshot: string, options: ValidateSkuOptions) => {
      const cloud = SnapshotCloud.fromFile(resolve(snapshot));
      const outcome = await validateSku(cloud, options);
      if (options.json) {
        console.log(JSON.stringify(outcome, null, 2));
        return;
      }
      for (const line of formatValidation(options.sku, options.region, outcome)) {
        console.log(`  ${line}`);
      }
    });

  return cmd;
}
