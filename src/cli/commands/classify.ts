/**
 * `rightsizer classify <sku...>`: show how SKU names are read by the scorer.
 */

import { Command } from 'commander';
import { extractFamily, extractGeneration, getSkuVersion, isBurstable } from '../../rightsizing/classifier.js';

export interface SkuClassification {
  sku: string;
  family: string;
  generation: string;
  version: number;
  burstable: boolean;
}

export function classifySku(sku: string): SkuClassification {
  return {
    sku,
    family: extractFamily(sku),
    generation: extractGeneration(sku),
    version: getSkuVersion(sku),
    burstable: isBurstable(sku),
  };
}

export function createClassifyCommand(): Command {
  const cmd = new Command('classify');

  cmd
    .description('Print family, generation and version for SKU names')
    .argument('<sku...>', 'SKU names, e.g. Standard_D4s_v3')
    .option('--json', 'Output as JSON')
    .action((skus: string[], options: { json?: boolean }) => {
      const rows = skus.map(classifySku);
      if (options.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      for (const row of rows) {
        const burst = row.burstable ? '  (burstable)' : '';
        console.log(`  ${row.sku.padEnd(28)} family ${row.family.padEnd(4)} ${row.generation.padEnd(5)} v${row.version}${burst}`);
      }
    });

  return cmd;
}
