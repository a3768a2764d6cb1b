import type { Priority, RecommendationType, RightsizingResult } from './types.js';

export const SHUTDOWN_AVG_CPU = 5;
export const SHUTDOWN_MAX_CPU = 10;

export function priorityForSavings(savings: number): Priority {
  if (savings > 500) return 'High';
  if (savings > 100) return 'Medium';
  return 'Low';
}

export function isShutdownCandidate(result: RightsizingResult): boolean {
  const { avgCpu, maxCpu } = result.instance.metrics;
  return avgCpu !== undefined && avgCpu < SHUTDOWN_AVG_CPU
    && maxCpu !== undefined && maxCpu < SHUTDOWN_MAX_CPU;
}

/**
 * Pick the recommendation type, savings and priority for an analyzed instance.
 *
 * Idle instances short-circuit to shutdown. Otherwise each savings source is
 * compared in a fixed order and replaces the running choice only when it is
 * strictly larger, so on a tie the earlier source keeps the type.
 */
export function selectRecommendation(result: RightsizingResult): RightsizingResult {
  if (isShutdownCandidate(result)) {
    result.recommendationType = 'shutdown';
    result.totalPotentialSavings = result.instance.priceMonthly ?? 0;
    result.priority = 'High';
    return result;
  }

  let type: RecommendationType = result.recommendationType;
  let savings = result.totalPotentialSavings;

  const consider = (candidate: RecommendationType, value: number | undefined): void => {
    if (value !== undefined && value > savings) {
      type = candidate;
      savings = value;
    }
  };

  consider('generation_upgrade', result.generationSavings);
  consider('rightsize', result.advisorHint?.estimatedSavings);
  consider('rightsize', result.aiRecommendation?.estimatedMonthlySavings);
  consider('region_move', result.cheaperRegions[0]?.savings);
  consider('rightsize', result.rankedAlternatives[0]?.savings);

  result.recommendationType = type;
  result.totalPotentialSavings = savings;
  result.priority = priorityForSavings(savings);
  return result;
}
