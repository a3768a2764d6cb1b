import type { AIRecommendation, InstanceDescriptor, SkuRanking } from '../rightsizing/types.js';
import type { JsonObject } from './response-parser.js';

const LEVELS = ['Low', 'Medium', 'High'] as const;

type Level = typeof LEVELS[number];

function toLevel(value: unknown): Level {
  if (typeof value !== 'string') return 'Medium';
  const wanted = value.trim().toLowerCase();
  return LEVELS.find(level => level.toLowerCase() === wanted) ?? 'Medium';
}

function toAmount(value: unknown): number {
  let amount = 0;
  if (typeof value === 'number') {
    amount = value;
  } else if (typeof value === 'string') {
    amount = parseFloat(value.replace(/[$,\s]/g, ''));
  }
  return Number.isFinite(amount) && amount > 0 ? amount : 0;
}

function toText(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function toStrings(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value)) return [];
  return value.filter((action): action is string => typeof action === 'string');
}

/**
 * Coerce a parsed model response into a well-formed recommendation.
 * Levels outside the closed set become Medium, savings are clamped at 0,
 * and a missing SKU falls back to the instance's current one.
 */
export function normalizeRecommendation(raw: JsonObject, instance: InstanceDescriptor): AIRecommendation {
  const sku = typeof raw.recommended_sku === 'string' ? raw.recommended_sku.trim() : '';

  return {
    instanceName: instance.name,
    currentSku: instance.sku,
    recommendedSku: sku || instance.sku,
    confidence: toLevel(raw.confidence),
    reasoning: toText(raw.reasoning),
    riskAssessment: toText(raw.risk_assessment),
    estimatedMonthlySavings: toAmount(raw.estimated_monthly_savings_usd ?? raw.estimated_monthly_savings),
    migrationComplexity: toLevel(raw.migration_complexity),
    recommendedActions: toStrings(raw.recommended_actions),
  };
}

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toScore(value: unknown): number {
  const score = typeof value === 'number' ? value : parseFloat(toText(value));
  return Number.isFinite(score) ? Math.min(100, Math.max(0, score)) : 0;
}

/**
 * Rankings from a parsed model response, ordered by rank. Entries without a
 * SKU name are dropped; a missing or invalid rank falls back to position.
 */
export function normalizeRankings(raw: JsonObject): SkuRanking[] {
  if (!Array.isArray(raw.rankings)) return [];

  const rankings: SkuRanking[] = [];
  for (const [index, entry] of raw.rankings.entries()) {
    if (!isRecord(entry)) continue;
    const sku = toText(entry.sku).trim();
    if (!sku) continue;

    const rank = typeof entry.rank === 'number' && Number.isInteger(entry.rank) && entry.rank > 0 ? entry.rank : index + 1;
    rankings.push({
      rank,
      sku,
      score: toScore(entry.score),
      monthlyCost: toAmount(entry.monthly_cost_usd),
      strengths: toStrings(entry.strengths),
      weaknesses: toStrings(entry.weaknesses),
      bestFor: toText(entry.best_for),
    });
  }

  return rankings.sort((a, b) => a.rank - b.rank);
}
