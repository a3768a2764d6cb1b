/**
 * AI Recommendation Adapter
 *
 * Wraps a completion provider with the prompt, parsing and retry contract
 * the orchestrator relies on. One semaphore per adapter bounds outbound
 * completions across every concurrent instance analysis, independently of
 * the analysis worker pool width.
 */

import { AsyncSemaphore } from '../core/mutex.js';
import { getLogger } from '../core/logger.js';
import { isTransientError, retry } from '../utils/retry.js';
import type { CompletionProvider, CompletionRequest } from '../providers/types.js';
import type {
  AdvisorHint,
  AIRecommendation,
  InstanceDescriptor,
  RightsizingResult,
  SkuDescriptor,
  SkuRanking,
  WorkloadProfile,
} from '../rightsizing/types.js';
import { extractJSON } from './response-parser.js';
import { normalizeRankings, normalizeRecommendation } from './normalize.js';
import {
  RANKING_SYSTEM_PROMPT,
  RECOMMENDATION_SYSTEM_PROMPT,
  buildRankingPrompt,
  buildRecommendationPrompt,
  buildSummaryPrompt,
  type PromptCandidate,
  type SummaryTotals,
} from './prompts.js';

export interface AdapterOptions {
  /** Concurrent completions allowed across the whole run */
  permits: number;
  maxRetries: number;
  /** First backoff delay; doubles on each retry */
  baseDelayMs: number;
  maxTokens: number;
  summaryMaxTokens: number;
}

const DEFAULT_OPTIONS: AdapterOptions = {
  permits: 5,
  maxRetries: 2,
  baseDelayMs: 1000,
  maxTokens: 2000,
  summaryMaxTokens: 1000,
};

export class AIRecommendationAdapter {
  private readonly options: AdapterOptions;
  private readonly semaphore: AsyncSemaphore;
  private logger = getLogger();

  constructor(private readonly provider: CompletionProvider, options: Partial<AdapterOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.semaphore = new AsyncSemaphore(this.options.permits);
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Ask the model to arbitrate between ranked candidates. Undefined when the
   * response holds no usable JSON object; transport errors that survive the
   * retry policy are thrown.
   */
  async recommend(
    instance: InstanceDescriptor,
    candidates: readonly PromptCandidate[],
    priceTable: ReadonlyMap<string, number>,
    advisorHint?: AdvisorHint,
  ): Promise<AIRecommendation | undefined> {
    const text = await this.call({
      system: RECOMMENDATION_SYSTEM_PROMPT,
      prompt: buildRecommendationPrompt(instance, candidates, priceTable, advisorHint),
      maxTokens: this.options.maxTokens,
      json: true,
    });

    const parsed = extractJSON(text);
    if (!parsed) {
      this.logger.warn({ instance: instance.name, provider: this.provider.name }, 'AI response held no JSON object');
      return undefined;
    }

    return normalizeRecommendation(parsed, instance);
  }

  /**
   * Rank SKUs for a workload profile. Empty when the response holds no JSON
   * object or no usable rankings.
   */
  async rankSkus(
    profile: WorkloadProfile,
    skus: readonly SkuDescriptor[],
    priceTable: ReadonlyMap<string, number>,
  ): Promise<SkuRanking[]> {
    const text = await this.call({
      system: RANKING_SYSTEM_PROMPT,
      prompt: buildRankingPrompt(profile, skus, priceTable),
      maxTokens: this.options.maxTokens,
      json: true,
    });

    const parsed = extractJSON(text);
    if (!parsed) {
      this.logger.warn({ provider: this.provider.name }, 'AI ranking response held no JSON object');
      return [];
    }

    return normalizeRankings(parsed);
  }

  async summarize(results: readonly RightsizingResult[], totals: SummaryTotals): Promise<string> {
    const text = await this.call({
      prompt: buildSummaryPrompt(results, totals),
      maxTokens: this.options.summaryMaxTokens,
    });
    return text.trim();
  }

  private call(request: CompletionRequest): Promise<string> {
    return retry(
      () => this.semaphore.withPermit(() => this.provider.complete(request)),
      {
        maxRetries: this.options.maxRetries,
        baseDelay: this.options.baseDelayMs,
        backoffFactor: 2,
        jitter: false,
        isRetryable: isTransientError,
        onRetry: (attempt, error, delay) => {
          this.logger.warn({ provider: this.provider.name, attempt, delay, error: error.message }, 'Retrying AI call');
        },
      },
    );
  }
}
