/**
 * Terminal rendering of an analysis report.
 */

import type { AnalysisReport } from '../rightsizing/types.js';
import { recommendedSkuOf } from './csv.js';
import { formatCurrency } from './format.js';

export function formatTable(report: AnalysisReport, top: number = 20): string {
  const lines: string[] = [];
  const sep = '─'.repeat(96);

  lines.push(`\n  VM Rightsizing Report${report.scope ? `  |  Scope: ${report.scope}` : ''}`);
  lines.push(`  ${report.timestamp}`);
  lines.push(`  ${sep}`);
  lines.push(
    `  ${'Instance'.padEnd(24)} ${'Current SKU'.padEnd(20)} ${'Recommended'.padEnd(20)} ${'Type'.padEnd(19)} ${'Savings/mo'.padStart(10)}`,
  );
  lines.push(`  ${sep}`);

  for (const result of report.results.slice(0, top)) {
    const feasible = result.deploymentFeasible ? '' : ' !';
    lines.push(
      `  ${result.instance.name.padEnd(24)} ${result.instance.sku.padEnd(20)} ${recommendedSkuOf(result).padEnd(20)} ${result.recommendationType.padEnd(19)} ${formatCurrency(result.totalPotentialSavings).padStart(10)}${feasible}`,
    );
  }
  if (report.results.length > top) {
    lines.push(`  ... ${report.results.length - top} more`);
  }

  lines.push(`  ${sep}`);
  lines.push(`  Analyzed: ${report.analyzedInstances}/${report.totalInstances}  |  With recommendations: ${report.instancesWithRecommendations}`);
  lines.push(`  Current cost: ${formatCurrency(report.totalCurrentCost)}/mo  |  Potential savings: ${formatCurrency(report.totalPotentialSavings)}/mo (${formatCurrency(report.totalPotentialSavings * 12)}/yr)`);

  const b = report.breakdown;
  lines.push(`  Shutdown: ${b.shutdown}  Rightsize: ${b.rightsize}  Generation upgrade: ${b.generation_upgrade}  Region move: ${b.region_move}`);

  if (report.failedInstances.length > 0) {
    lines.push(`\n  Failed:`);
    for (const failure of report.failedInstances) {
      lines.push(`    ${failure.name}: ${failure.reason}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}
