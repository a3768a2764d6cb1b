export * from './types.js';
export { extractGeneration, extractFamily, extractVersionNumber, getSkuVersion, isBurstable } from './classifier.js';
export {
  computeAcceptableRange,
  scoreCandidate,
  rankCandidates,
  MAX_RANKED_CANDIDATES,
  type AcceptableRange,
  type RankingInput,
  type RankingOutcome,
  type ScoreBreakdown,
  type SkipReason,
} from './scorer.js';
export {
  validateAndPromote,
  requiredFeaturesOf,
  matchQuota,
  QuotaBackedValidator,
  type ConstraintValidator,
  type PromotionContext,
  type PromotionOutcome,
  type ValidationRequest,
} from './validator.js';
export { SkuCatalogCache, PriceCache, normalizeRegion } from './cache.js';
export {
  findGenerationTarget,
  evaluateGenerationUpgrade,
  evaluateRegionAlternatives,
  loadGenerationMap,
  loadRegionAdjacency,
  compareRegionPrices,
  type GenerationMap,
  type RegionAdjacency,
  type RegionPriceComparison,
  type RegionPriceRow,
} from './opportunities.js';
export {
  calculateSimilarity,
  findSimilarSkus,
  checkSkuAvailability,
  checkSkuAcrossRegions,
  MIN_SIMILARITY,
  type SimilarSku,
  type SkuAvailability,
} from './availability.js';
export { selectRecommendation, priorityForSavings, isShutdownCandidate } from './recommendation.js';
export {
  AnalysisOrchestrator,
  type OrchestratorDeps,
  type OrchestratorOptions,
  type RunRequest,
  type ValidatorFactory,
} from './orchestrator.js';
