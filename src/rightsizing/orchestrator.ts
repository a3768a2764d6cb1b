/**
 * Analysis Orchestrator
 *
 * Drives one run through Discover -> Prefetch -> AnalyzeAll -> Summarize -> Done.
 * Prefetch and per-instance analysis share one bounded worker pool width;
 * everything within an instance's analysis is sequential. Shared aggregates
 * are merged under a single mutex, and the final ordering comes from a sort,
 * never from completion order.
 */

import { nanoid } from 'nanoid';
import { AsyncMutex } from '../core/mutex.js';
import { getLogger, type Logger } from '../core/logger.js';
import { CollaboratorError, toError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { runBounded } from '../utils/pool.js';
import type { AIRecommendationAdapter } from '../ai/advisor.js';
import { buildTextSummary, type SummaryTotals } from '../ai/prompts.js';
import type {
  CatalogCollaborator,
  InventoryCollaborator,
  PriceCollaborator,
} from '../collaborators/types.js';
import { PriceCache, SkuCatalogCache, normalizeRegion } from './cache.js';
import { extractGeneration } from './classifier.js';
import { rankCandidates } from './scorer.js';
import { requiredFeaturesOf, validateAndPromote, type ConstraintValidator } from './validator.js';
import {
  evaluateGenerationUpgrade,
  evaluateRegionAlternatives,
  loadGenerationMap,
  loadRegionAdjacency,
  type GenerationMap,
  type RegionAdjacency,
} from './opportunities.js';
import { selectRecommendation } from './recommendation.js';
import {
  HOURS_PER_MONTH,
  emptyResult,
  type AdvisorHint,
  type AnalysisPhase,
  type AnalysisReport,
  type CountedRecommendation,
  type InstanceDescriptor,
  type RightsizingResult,
  type ScoringPolicy,
} from './types.js';

export type ValidatorFactory = (catalog: SkuCatalogCache) => ConstraintValidator;

export interface OrchestratorDeps {
  inventory: InventoryCollaborator;
  catalog: CatalogCollaborator;
  prices: PriceCollaborator;
  /** A validator, or a factory given the run's catalog cache */
  validator?: ConstraintValidator | ValidatorFactory;
  advisor?: AIRecommendationAdapter;
  events?: EventBus;
  logger?: Logger;
}

export interface OrchestratorOptions {
  policy: ScoringPolicy;
  workers: number;
  instanceTimeoutMs: number;
  batchTimeoutMs: number;
  lookbackDays: number;
  includeMetrics: boolean;
  includeAi: boolean;
  generationMap?: GenerationMap;
  regionAdjacency?: RegionAdjacency;
}

export interface RunRequest {
  /** Resource group or other inventory filter */
  scope?: string;
}

interface RunContext {
  runId: string;
  catalog: SkuCatalogCache;
  prices: PriceCache;
  validator?: ConstraintValidator;
  hints: AdvisorHint[];
  generationMap: GenerationMap;
  regionAdjacency: RegionAdjacency;
}

interface Aggregate {
  mutex: AsyncMutex;
  results: RightsizingResult[];
  totalCurrentCost: number;
  totalPotentialSavings: number;
  instancesWithRecommendations: number;
  breakdown: Record<CountedRecommendation, number>;
}

export class AnalysisOrchestrator {
  private logger: Logger;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.logger = deps.logger ?? getLogger();
  }

  async run(request: RunRequest = {}): Promise<AnalysisReport> {
    const runId = nanoid(10);
    const startedAt = new Date();
    const catalog = new SkuCatalogCache(this.deps.catalog);
    const prices = new PriceCache(this.deps.prices);
    const { validator } = this.deps;

    // Discover
    this.enterPhase(runId, 'Discover');
    const instances = await this.discover(request.scope);
    const hints = await this.listHints(request.scope);
    this.logger.info({ runId, instances: instances.length, hints: hints.length }, 'Inventory discovered');

    const ctx: RunContext = {
      runId,
      catalog,
      prices,
      validator: typeof validator === 'function' ? validator(catalog) : validator,
      hints,
      generationMap: this.options.generationMap ?? loadGenerationMap(),
      regionAdjacency: this.options.regionAdjacency ?? loadRegionAdjacency(),
    };

    // Prefetch
    this.enterPhase(runId, 'Prefetch');
    await this.prefetch(ctx, instances);

    // AnalyzeAll
    this.enterPhase(runId, 'AnalyzeAll');
    const aggregate: Aggregate = {
      mutex: new AsyncMutex(),
      results: [],
      totalCurrentCost: 0,
      totalPotentialSavings: 0,
      instancesWithRecommendations: 0,
      breakdown: { shutdown: 0, rightsize: 0, generation_upgrade: 0, region_move: 0 },
    };

    const outcomes = await runBounded(
      instances,
      this.options.workers,
      async (instance, _index, signal) => {
        const started = Date.now();
        const result = await this.analyzeInstance(instance, ctx);
        await aggregate.mutex.withLock(() => {
          if (signal.aborted) return;
          this.merge(aggregate, result);
          this.deps.events?.emit('instance:analyzed', {
            runId, instance: instance.name, result, durationMs: Date.now() - started,
          });
        });
        return result;
      },
      {
        taskTimeoutMs: this.options.instanceTimeoutMs,
        batchTimeoutMs: this.options.batchTimeoutMs,
        label: index => `Analysis of ${instances[index].name}`,
      },
    );

    const failedInstances: AnalysisReport['failedInstances'] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') return;
      const name = instances[index].name;
      failedInstances.push({ name, reason: outcome.reason.message });
      this.logger.warn({ runId, instance: name, error: outcome.reason.message }, 'Instance analysis failed');
      this.deps.events?.emit('instance:failed', { runId, instance: name, reason: outcome.reason.message });
    });

    // Summarize
    this.enterPhase(runId, 'Summarize');
    const results = [...aggregate.results].sort((a, b) => b.totalPotentialSavings - a.totalPotentialSavings);
    const totals: SummaryTotals = {
      totalInstances: instances.length,
      analyzedInstances: results.length,
      totalCurrentCost: aggregate.totalCurrentCost,
      totalPotentialSavings: aggregate.totalPotentialSavings,
    };

    const report: AnalysisReport = {
      id: runId,
      timestamp: startedAt.toISOString(),
      scope: request.scope,
      totalInstances: instances.length,
      analyzedInstances: results.length,
      failedInstances,
      instancesWithRecommendations: aggregate.instancesWithRecommendations,
      totalCurrentCost: aggregate.totalCurrentCost,
      totalPotentialSavings: aggregate.totalPotentialSavings,
      breakdown: aggregate.breakdown,
      results,
      executiveSummary: await this.summarize(results, totals),
    };

    this.enterPhase(runId, 'Done');
    this.logger.info(
      { runId, analyzed: report.analyzedInstances, failed: failedInstances.length, savings: report.totalPotentialSavings },
      'Analysis complete',
    );
    return report;
  }

  /**
   * Full analysis of one instance. Missing data and failed price or metrics
   * lookups skip the affected step; a catalog failure fails the instance.
   */
  private async analyzeInstance(instance: InstanceDescriptor, ctx: RunContext): Promise<RightsizingResult> {
    const { policy } = this.options;
    const result = emptyResult(instance);
    const priceOf = (sku: string) => this.lookupPrice(ctx, sku, instance);

    const hourly = await priceOf(instance.sku);
    if (hourly !== undefined) {
      instance.priceHourly = hourly;
      instance.priceMonthly = hourly * HOURS_PER_MONTH;
    }

    if (this.options.includeMetrics) {
      try {
        await this.deps.inventory.enrichMetrics(instance, this.options.lookbackDays);
      } catch (err) {
        this.logger.warn({ instance: instance.name, error: toError(err).message }, 'Metrics unavailable');
      }
    }

    const name = instance.name.toLowerCase();
    result.advisorHint = ctx.hints.find(hint => hint.instanceName.toLowerCase() === name);

    result.currentGeneration = extractGeneration(instance.sku);
    const upgrade = await evaluateGenerationUpgrade(instance, ctx.generationMap, ctx.catalog, priceOf);
    if (upgrade) {
      result.recommendedGenerationUpgrade = upgrade.target;
      result.generationSavings = upgrade.savings;
    }

    try {
      result.cheaperRegions = await evaluateRegionAlternatives(instance, ctx.regionAdjacency, this.deps.prices);
    } catch (err) {
      this.logger.warn({ instance: instance.name, error: toError(err).message }, 'Regional prices unavailable');
    }

    const skus = await ctx.catalog.get(instance.region);
    const currentSku = skus.find(sku => sku.name === instance.sku);
    if (!currentSku) {
      result.scoringSkipped = 'current-sku-not-in-catalog';
      this.logger.info({ instance: instance.name, sku: instance.sku, region: instance.region }, 'Current SKU not in catalog, scoring skipped');
    } else {
      const ranking = await rankCandidates({
        instance,
        currentSku,
        catalog: skus,
        priceOf,
        policy,
      });
      this.logger.debug({ instance: instance.name, candidates: ranking.candidates.length, skipped: ranking.skipped }, 'Candidates ranked');

      let ranked = ranking.candidates;
      if (ctx.validator && ranked.length > 0) {
        const promotion = await validateAndPromote(
          ranked,
          { region: instance.region, requiredFeatures: requiredFeaturesOf(currentSku) },
          ctx.validator,
          this.logger,
        );
        ranked = promotion.candidates;
        result.deploymentFeasible = promotion.deploymentFeasible;
        result.constraintIssues.push(...promotion.constraintIssues);
        result.quotaWarnings.push(...promotion.quotaWarnings);
      }

      result.rankedAlternatives = ranked;
      result.validatedAlternatives = ranked.filter(candidate => candidate.isValid);
    }

    if (this.options.includeAi && this.deps.advisor) {
      const priceTable = new Map<string, number>();
      for (const sku of [instance.sku, ...result.rankedAlternatives.map(candidate => candidate.sku)]) {
        const price = ctx.prices.peek(sku, instance.region, instance.osType);
        if (price !== undefined) priceTable.set(sku, price);
      }

      try {
        result.aiRecommendation = await this.deps.advisor.recommend(
          instance, result.rankedAlternatives, priceTable, result.advisorHint,
        );
      } catch (err) {
        this.logger.warn({ instance: instance.name, error: toError(err).message }, 'AI recommendation failed');
      }
    }

    return selectRecommendation(result);
  }

  private async lookupPrice(ctx: RunContext, sku: string, instance: InstanceDescriptor): Promise<number | undefined> {
    try {
      return await ctx.prices.get(sku, instance.region, instance.osType);
    } catch (err) {
      this.logger.debug({ sku, region: instance.region, error: toError(err).message }, 'Price lookup failed');
      return undefined;
    }
  }

  private enterPhase(runId: string, phase: AnalysisPhase): void {
    this.logger.debug({ runId, phase }, 'Run phase');
    this.deps.events?.emit('run:phase', { runId, phase, timestamp: Date.now() });
  }

  private async discover(scope?: string): Promise<InstanceDescriptor[]> {
    try {
      return await this.deps.inventory.listInstances(scope);
    } catch (err) {
      throw new CollaboratorError('Failed to list instances', 'inventory', 'discover', toError(err));
    }
  }

  private async listHints(scope?: string): Promise<AdvisorHint[]> {
    try {
      return await this.deps.inventory.listAdvisorHints(scope);
    } catch (err) {
      this.logger.warn({ error: toError(err).message }, 'Advisor hints unavailable');
      return [];
    }
  }

  /**
   * Warm the catalog per region and the current-SKU price per instance.
   * Individual misses are tolerated; losing every region's catalog aborts the run.
   */
  private async prefetch(ctx: RunContext, instances: readonly InstanceDescriptor[]): Promise<void> {
    const regions = [...new Set(instances.map(instance => normalizeRegion(instance.region)))];
    const width = this.options.workers;

    const catalogOutcomes = await runBounded(regions, width, region => ctx.catalog.get(region));
    let catalogFailures = 0;
    catalogOutcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') return;
      catalogFailures++;
      this.prefetchMiss(ctx.runId, 'catalog', regions[index], outcome.reason);
    });
    if (regions.length > 0 && catalogFailures === regions.length) {
      const first = catalogOutcomes.find(outcome => outcome.status === 'rejected');
      throw new CollaboratorError(
        'SKU catalog unavailable for every region',
        'catalog',
        'prefetch',
        first?.status === 'rejected' ? first.reason : undefined,
      );
    }

    const priceOutcomes = await runBounded(
      instances,
      width,
      instance => ctx.prices.get(instance.sku, instance.region, instance.osType),
    );
    priceOutcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') return;
      const instance = instances[index];
      this.prefetchMiss(ctx.runId, 'price', PriceCache.key(instance.sku, instance.region, instance.osType), outcome.reason);
    });
  }

  private prefetchMiss(runId: string, kind: 'catalog' | 'price', key: string, error: Error): void {
    this.logger.warn({ runId, kind, key, error: error.message }, 'Prefetch failed');
    this.deps.events?.emit('prefetch:miss', { runId, kind, key, error: error.message });
  }

  private merge(aggregate: Aggregate, result: RightsizingResult): void {
    aggregate.results.push(result);
    aggregate.totalCurrentCost += result.instance.priceMonthly ?? 0;

    if (result.totalPotentialSavings > 0) {
      aggregate.totalPotentialSavings += result.totalPotentialSavings;
      aggregate.instancesWithRecommendations++;
      if (result.recommendationType !== 'none') {
        aggregate.breakdown[result.recommendationType]++;
      }
    }
  }

  private async summarize(results: readonly RightsizingResult[], totals: SummaryTotals): Promise<string> {
    if (this.options.includeAi && this.deps.advisor) {
      try {
        const summary = await this.deps.advisor.summarize(results, totals);
        if (summary) return summary;
      } catch (err) {
        this.logger.warn({ error: toError(err).message }, 'AI summary failed, using text summary');
      }
    }
    return buildTextSummary(results, totals);
  }
}
