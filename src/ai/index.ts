export { AIRecommendationAdapter, type AdapterOptions } from './advisor.js';
export { extractJSON, scanBalancedObject, type JsonObject } from './response-parser.js';
export { normalizeRankings, normalizeRecommendation } from './normalize.js';
export { inferEnvironment, inferWorkloadRole, type Environment } from './workload.js';
export {
  buildRankingPrompt,
  buildRecommendationPrompt,
  buildSummaryPrompt,
  buildTextSummary,
  type PromptCandidate,
  type SummaryTotals,
} from './prompts.js';
