import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ReportFormat, ReportSink } from '../collaborators/types.js';
import type { AnalysisReport, RightsizingResult } from '../rightsizing/types.js';

export const CSV_COLUMNS = [
  'Instance',
  'Resource Group',
  'Region',
  'Current SKU',
  'Current Monthly',
  'Recommended SKU',
  'Recommended Monthly',
  'Monthly Savings',
  'Annual Savings',
  'Recommendation Type',
  'Priority',
  'Confidence',
  'Avg CPU %',
  'Max CPU %',
  'Current Generation',
  'Deployment Feasible',
  'Constraint Issues',
] as const;

const NOT_AVAILABLE = 'N/A';

/** Quote a field when it holds a comma, quote or line break */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * The SKU a reader should act on: the AI pick, then the advisor hint,
 * then the generation upgrade, then the top-ranked candidate.
 */
export function recommendedSkuOf(result: RightsizingResult): string {
  if (result.recommendationType === 'shutdown') return 'Shutdown';
  if (result.aiRecommendation) return result.aiRecommendation.recommendedSku;
  if (result.advisorHint?.recommendedSku) return result.advisorHint.recommendedSku;
  if (result.recommendedGenerationUpgrade) return result.recommendedGenerationUpgrade;
  const top = result.rankedAlternatives[0];
  return top ? top.sku : 'No change';
}

function money(value: number | undefined): string {
  return value === undefined ? NOT_AVAILABLE : value.toFixed(2);
}

function metric(value: number | undefined): string {
  return value === undefined ? NOT_AVAILABLE : value.toFixed(1);
}

export function toCsvRow(result: RightsizingResult): string[] {
  const { instance } = result;
  const current = instance.priceMonthly;
  const savings = result.totalPotentialSavings;

  return [
    instance.name,
    instance.resourceGroup,
    instance.region,
    instance.sku,
    money(current),
    recommendedSkuOf(result),
    money(current === undefined ? undefined : current - savings),
    savings.toFixed(2),
    (savings * 12).toFixed(2),
    result.recommendationType,
    result.priority,
    result.aiRecommendation?.confidence ?? NOT_AVAILABLE,
    metric(instance.metrics.avgCpu),
    metric(instance.metrics.maxCpu),
    result.currentGeneration || NOT_AVAILABLE,
    result.deploymentFeasible ? 'Yes' : 'No',
    result.constraintIssues.length > 0 ? result.constraintIssues.join('; ') : 'None',
  ];
}

export function renderCsv(report: AnalysisReport): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const result of report.results) {
    lines.push(toCsvRow(result).map(escapeCsvField).join(','));
  }
  return lines.join('\n') + '\n';
}

export class CsvReportSink implements ReportSink {
  readonly format: ReportFormat = 'csv';

  constructor(private readonly path: string) {}

  async write(report: AnalysisReport): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, renderCsv(report), 'utf-8');
  }
}
