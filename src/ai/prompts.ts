import {
  HOURS_PER_MONTH,
  type AdvisorHint,
  type InstanceDescriptor,
  type RightsizingResult,
  type SkuDescriptor,
  type SkuFeature,
  type WorkloadProfile,
} from '../rightsizing/types.js';
import { inferEnvironment, inferWorkloadRole } from './workload.js';
import { roundTo } from '../utils/math.js';
import { formatCurrency } from '../report/format.js';

export const MAX_PROMPT_CANDIDATES = 20;

export const RECOMMENDATION_SYSTEM_PROMPT = `You are a cloud FinOps engineer reviewing virtual machine sizing.
You weigh cost savings against performance risk, prefer newer hardware generations when they are cheaper,
and never recommend a size that would starve the workload. Respond with a single JSON object and nothing else.`;

export interface PromptCandidate {
  sku: string;
  vcpus: number;
  memoryGb: number;
  generation: string;
  features: readonly SkuFeature[];
}

function metric(value: number | undefined): number | string {
  return value === undefined ? 'N/A' : roundTo(value, 2);
}

export function buildRecommendationPrompt(
  instance: InstanceDescriptor,
  candidates: readonly PromptCandidate[],
  priceTable: ReadonlyMap<string, number>,
  advisorHint?: AdvisorHint,
): string {
  const vm = {
    name: instance.name,
    current_sku: instance.sku,
    region: instance.region,
    os_type: instance.osType,
    power_state: instance.powerState,
    environment: inferEnvironment(instance),
    workload_role: inferWorkloadRole(instance.name),
    data_disks: instance.dataDiskCount,
    metrics: {
      avg_cpu_percent: metric(instance.metrics.avgCpu),
      max_cpu_percent: metric(instance.metrics.maxCpu),
      avg_memory_percent: metric(instance.metrics.avgMemory),
      max_memory_percent: metric(instance.metrics.maxMemory),
      avg_disk_iops: metric(instance.metrics.avgDiskIops),
    },
    current_monthly_cost: instance.priceMonthly === undefined ? 'Unknown' : roundTo(instance.priceMonthly, 2),
  };

  const options = candidates.slice(0, MAX_PROMPT_CANDIDATES).map(candidate => {
    const hourly = priceTable.get(candidate.sku);
    return {
      name: candidate.sku,
      vcpus: candidate.vcpus,
      memory_gb: candidate.memoryGb,
      generation: candidate.generation,
      features: candidate.features,
      hourly_price: hourly === undefined ? 'Unknown' : roundTo(hourly, 4),
      monthly_price: hourly === undefined ? 'Unknown' : roundTo(hourly * HOURS_PER_MONTH, 2),
    };
  });

  const advisor = advisorHint
    ? JSON.stringify({
      problem: advisorHint.problem,
      solution: advisorHint.solution,
      recommended_sku: advisorHint.recommendedSku,
      estimated_savings: advisorHint.estimatedSavings,
    }, null, 2)
    : 'No advisor recommendation available';

  return `Analyze this virtual machine and recommend the best size.

Current VM:
${JSON.stringify(vm, null, 2)}

Candidate SKUs (pre-filtered and ranked):
${JSON.stringify(options, null, 2)}

Advisor recommendation:
${advisor}

Respond with JSON in exactly this shape:
{
  "recommended_sku": "SKU name",
  "confidence": "High/Medium/Low",
  "reasoning": "Why this size fits",
  "estimated_monthly_savings_usd": number,
  "risk_assessment": "Risks of the change",
  "migration_complexity": "Low/Medium/High",
  "recommended_actions": ["action1", "action2"]
}

Consider historical utilization, savings potential, generation upgrades,
whether the workload is bursty or steady, and the environment's tolerance for risk.`;
}

export const RANKING_SYSTEM_PROMPT = `You are a cloud FinOps engineer comparing virtual machine sizes for a workload.
Respond with a single JSON object and nothing else.`;

export function buildRankingPrompt(
  profile: WorkloadProfile,
  skus: readonly SkuDescriptor[],
  priceTable: ReadonlyMap<string, number>,
): string {
  const workload = {
    vcpus: profile.vcpus,
    memory_gb: profile.memoryGb,
    region: profile.region,
    os_type: profile.osType,
    description: profile.workload ?? 'Not specified',
  };

  const options = skus.slice(0, MAX_PROMPT_CANDIDATES).map(sku => {
    const hourly = priceTable.get(sku.name);
    return {
      name: sku.name,
      vcpus: sku.vcpus,
      memory_gb: sku.memoryGb,
      max_iops: sku.maxIops,
      generation: sku.generation,
      features: sku.features,
      hourly_price: hourly === undefined ? 'Unknown' : roundTo(hourly, 4),
      monthly_price: hourly === undefined ? 'Unknown' : roundTo(hourly * HOURS_PER_MONTH, 2),
    };
  });

  return `Rank the following VM sizes for the workload described.

Workload profile:
${JSON.stringify(workload, null, 2)}

SKU options with pricing:
${JSON.stringify(options, null, 2)}

Respond with JSON in exactly this shape:
{
  "rankings": [
    {
      "rank": 1,
      "sku": "SKU name",
      "score": 85,
      "monthly_cost_usd": number,
      "strengths": ["..."],
      "weaknesses": ["..."],
      "best_for": "Use case description"
    }
  ],
  "recommendation_summary": "Overall recommendation",
  "considerations": ["Important factors"]
}

Weigh price/performance (35%), right-sizing fit (25%), generation with newer better (20%)
and feature alignment (20%).`;
}

export interface SummaryTotals {
  totalInstances: number;
  analyzedInstances: number;
  totalCurrentCost: number;
  totalPotentialSavings: number;
}

export function buildSummaryPrompt(results: readonly RightsizingResult[], totals: SummaryTotals): string {
  const withSavings = results.filter(result => result.totalPotentialSavings > 0);
  const confidence = { High: 0, Medium: 0, Low: 0 };
  for (const result of results) {
    if (result.aiRecommendation) confidence[result.aiRecommendation.confidence]++;
  }

  const top = withSavings.slice(0, 5).map(result => {
    const target = result.rankedAlternatives[0]?.sku ?? result.recommendedGenerationUpgrade ?? result.instance.sku;
    return `- ${result.instance.name}: ${result.instance.sku} -> ${target} `
      + `(${result.recommendationType}, ${formatCurrency(result.totalPotentialSavings)}/month)`;
  });

  return `Write a concise executive summary of a virtual machine rightsizing analysis.

Instances in scope: ${totals.totalInstances}
Instances analyzed: ${totals.analyzedInstances}
Instances with savings: ${withSavings.length}
Current monthly cost: ${formatCurrency(totals.totalCurrentCost)}
Potential monthly savings: ${formatCurrency(totals.totalPotentialSavings)}

AI recommendation confidence:
- High: ${confidence.High}
- Medium: ${confidence.Medium}
- Low: ${confidence.Low}

Top savings opportunities:
${top.length > 0 ? top.join('\n') : 'None'}

Write 2-3 short paragraphs for management covering key findings, quick wins and next steps. Plain text, no JSON.`;
}

/**
 * Deterministic summary used when AI is disabled or the summary call fails.
 */
export function buildTextSummary(results: readonly RightsizingResult[], totals: SummaryTotals): string {
  const withSavings = results.filter(result => result.totalPotentialSavings > 0);
  const quickWins = withSavings.filter(result => result.priority === 'High').length;

  return [
    'VM Rightsizing Analysis Summary',
    '',
    `Instances analyzed: ${totals.analyzedInstances} of ${totals.totalInstances}`,
    `Instances with savings opportunities: ${withSavings.length}`,
    `Current monthly cost: ${formatCurrency(totals.totalCurrentCost)}`,
    `Estimated monthly savings: ${formatCurrency(totals.totalPotentialSavings)}`,
    `Estimated annual savings: ${formatCurrency(totals.totalPotentialSavings * 12)}`,
    `High priority opportunities: ${quickWins}`,
    '',
    'Next steps:',
    '1. Review high priority recommendations for immediate action',
    '2. Validate medium priority recommendations with application owners',
    '3. Consider reserved capacity for steadily utilized instances',
    '4. Monitor resized instances after the change',
  ].join('\n');
}
