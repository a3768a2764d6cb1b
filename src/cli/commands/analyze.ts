/**
 * `rightsizer analyze <snapshot>`: run a full rightsizing analysis over an
 * inventory snapshot and print or export the report.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { resolve } from 'path';
import { ConfigManager, toScoringPolicy } from '../../core/config.js';
import { EventBus } from '../../core/events.js';
import type { RightsizerConfig, RightsizerConfigInput } from '../../core/types.js';
import { SnapshotCloud } from '../../collaborators/snapshot.js';
import type { ReportFormat } from '../../collaborators/types.js';
import { createCompletionProvider } from '../../providers/registry.js';
import { AIRecommendationAdapter } from '../../ai/advisor.js';
import { AnalysisOrchestrator } from '../../rightsizing/orchestrator.js';
import { QuotaBackedValidator } from '../../rightsizing/validator.js';
import { exportReport, formatCurrency, formatTable } from '../../report/index.js';
import { VERSION } from '../../version.js';

export interface AnalyzeOptions {
  output?: string;
  format?: ReportFormat;
  workers?: number;
  ai: boolean;
  metrics: boolean;
  validation: boolean;
  sameFamily?: boolean;
  burstable: boolean;
  skipDiskCheck?: boolean;
  skipNetworkCheck?: boolean;
  leap?: number;
  evolve: boolean;
  fallback: boolean;
  top: number;
  json?: boolean;
  dir: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

/** Comma-separated values, trimmed, empties dropped */
export function parseList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Translate CLI flags into configuration overrides. Flags left at their
 * defaults do not override file or environment settings.
 */
export function toConfigOverrides(options: AnalyzeOptions): RightsizerConfigInput {
  const analysis: NonNullable<RightsizerConfigInput['analysis']> = {};
  const filters: NonNullable<RightsizerConfigInput['filters']> = {};
  const generation: NonNullable<RightsizerConfigInput['generation']> = {};
  const concurrency: NonNullable<RightsizerConfigInput['concurrency']> = {};

  if (!options.ai) analysis.includeAi = false;
  if (!options.metrics) analysis.includeMetrics = false;
  if (!options.validation) analysis.validateConstraints = false;
  if (options.sameFamily) filters.sameFamilyOnly = true;
  if (!options.burstable) filters.allowBurstable = false;
  if (options.skipDiskCheck) filters.checkDiskRequirements = false;
  if (options.skipNetworkCheck) filters.checkNetworkRequirements = false;
  if (options.leap !== undefined) generation.leap = options.leap;
  if (!options.evolve) generation.evolveEnabled = false;
  if (!options.fallback) generation.fallback = false;
  if (options.workers !== undefined) concurrency.workers = options.workers;

  return { analysis, filters, generation, concurrency };
}

export function createAnalyzeCommand(): Command {
  const cmd = new Command('analyze');

  cmd
    .description('Analyze VMs in an inventory snapshot and recommend cheaper SKUs')
    .argument('<snapshot>', 'Snapshot file (YAML or JSON) with instances, SKUs, prices and quotas')
    .option('-d, --dir <directory>', 'Project directory for .rightsizer.yaml', '.')
    .option('-o, --output <path>', 'Write the report to a .json or .csv file')
    .addOption(new Option('--format <format>', 'Report format for --output').choices(['json', 'csv']))
    .option('-w, --workers <n>', 'Concurrent instance analyses', parsePositiveInt)
    .option('--no-ai', 'Skip AI recommendations and summary')
    .option('--no-metrics', 'Skip utilization metrics')
    .option('--no-validation', 'Skip quota, zone and restriction checks')
    .option('--same-family', 'Only consider candidates from the current SKU family')
    .option('--no-burstable', 'Exclude burstable SKUs')
    .option('--skip-disk-check', 'Allow candidates with fewer data disk slots')
    .option('--skip-network-check', 'Allow candidates without high network bandwidth')
    .option('--leap <n>', 'Generations to leap forward (1-3)', parsePositiveInt)
    .option('--no-evolve', 'Do not prefer newer hardware generations')
    .option('--no-fallback', 'Reject candidates older than the leap target')
    .option('--top <n>', 'Rows to print in the results table', parsePositiveInt, 20)
    .option('--json', 'Output the report as JSON')
    .action(async (snapshot: string, options: AnalyzeOptions) => {
      await executeAnalyze(snapshot, options);
    });

  return cmd;
}

/** Adapter for the configured provider, or undefined when it has no API key */
export function createAdvisor(config: RightsizerConfig): AIRecommendationAdapter | undefined {
  const provider = createCompletionProvider(config.ai);
  return provider
    ? new AIRecommendationAdapter(provider, {
      permits: config.concurrency.aiPermits,
      maxRetries: config.ai.maxRetries,
      baseDelayMs: config.ai.baseDelayMs,
      maxTokens: config.ai.maxTokens,
      summaryMaxTokens: config.ai.summaryMaxTokens,
    })
    : undefined;
}

function buildOrchestrator(config: RightsizerConfig, cloud: SnapshotCloud, events: EventBus): AnalysisOrchestrator {
  const advisor = config.analysis.includeAi ? createAdvisor(config) : undefined;

  return new AnalysisOrchestrator(
    {
      inventory: cloud,
      catalog: cloud,
      prices: cloud,
      validator: config.analysis.validateConstraints
        ? catalog => new QuotaBackedValidator(catalog, cloud)
        : undefined,
      advisor,
      events,
    },
    {
      policy: toScoringPolicy(config),
      workers: config.concurrency.workers,
      instanceTimeoutMs: config.concurrency.instanceTimeoutMs,
      batchTimeoutMs: config.concurrency.batchTimeoutMs,
      lookbackDays: config.analysis.lookbackDays,
      includeMetrics: config.analysis.includeMetrics,
      includeAi: advisor !== undefined,
    },
  );
}

async function executeAnalyze(snapshotPath: string, options: AnalyzeOptions): Promise<void> {
  const config = new ConfigManager(resolve(options.dir)).load(toConfigOverrides(options));
  const cloud = SnapshotCloud.fromFile(resolve(snapshotPath));
  const events = new EventBus();

  if (!options.json) {
    console.log();
    console.log(`🔎 rightsizer v${VERSION}`);
    console.log();

    const phaseNames: Record<string, string> = {
      Discover: '📋 Discovering instances...',
      Prefetch: '📦 Loading SKU catalogs and prices...',
      AnalyzeAll: '⚡ Analyzing instances...',
      Summarize: '📝 Summarizing...',
    };
    events.on('run:phase', ({ phase }) => {
      if (phase in phaseNames) console.log(phaseNames[phase]);
    });
    events.on('instance:analyzed', ({ instance, result }) => {
      const savings = result.totalPotentialSavings > 0 ? ` ${formatCurrency(result.totalPotentialSavings)}/mo` : '';
      console.log(`  ✓ ${instance} ${result.recommendationType}${savings}`);
    });
    events.on('instance:failed', ({ instance, reason }) => {
      console.log(`  ✗ ${instance}: ${reason}`);
    });
  }

  const orchestrator = buildOrchestrator(config, cloud, events);
  const report = await orchestrator.run({ scope: cloud.scope });
  events.removeAllListeners();

  if (options.output) {
    const written = await exportReport(report, resolve(options.output), options.format);
    if (!options.json) {
      console.log(`\n  Report written to ${options.output} (${written})`);
    }
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  console.log(formatTable(report, options.top));
  console.log(report.executiveSummary);
  console.log();
}
