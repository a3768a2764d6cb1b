/**
 * Candidate Scorer
 *
 * Turns a regional SKU catalog into a short ranked list of replacement
 * candidates for one instance: hard filters first, then a weighted score
 * over price, performance fit, hardware generation and features.
 */

import { extractFamily, getSkuVersion, isBurstable } from './classifier.js';
import { roundTo } from '../utils/math.js';
import {
  HOURS_PER_MONTH,
  type CandidateResult,
  type InstanceDescriptor,
  type ScoringPolicy,
  type SkuDescriptor,
  type SkuFeature,
} from './types.js';

export const MAX_RANKED_CANDIDATES = 10;

/** Bandwidth tier (Mbps) at which an instance counts as network-heavy */
const HIGH_BANDWIDTH_MBPS = 1000;

const FEATURE_POINTS: Partial<Record<SkuFeature, number>> = {
  PremiumStorage: 30,
  AcceleratedNetworking: 30,
  EphemeralOSDisk: 20,
};

export interface AcceptableRange {
  minVcpus: number;
  maxVcpus: number;
  minMemoryGb: number;
  maxMemoryGb: number;
  cpuFactor: number;
  memoryFactor: number;
}

export interface ScoreBreakdown {
  total: number;
  price: number;
  performance: number;
  generation: number;
  features: number;
}

export type SkipReason = 'range' | 'disk' | 'network' | 'family' | 'generation' | 'burstable' | 'unpriced';

export interface RankingInput {
  instance: InstanceDescriptor;
  currentSku: SkuDescriptor;
  catalog: readonly SkuDescriptor[];
  /** Hourly price, or undefined when the SKU has no price in the region */
  priceOf: (sku: string) => Promise<number | undefined>;
  policy: ScoringPolicy;
}

export interface RankingOutcome {
  candidates: CandidateResult[];
  range: AcceptableRange;
  skipped: Record<SkipReason, number>;
}

function cpuStretch(avg: number | undefined, peak: number | undefined, policy: ScoringPolicy): number {
  if (avg !== undefined && avg < policy.cpuThresholdLow) return policy.lowUtilizationFactor;
  if (peak !== undefined && peak > policy.cpuThresholdHigh) return policy.highUtilizationFactor;
  return 1;
}

/**
 * vCPU and memory window a candidate must fall into. Only the vCPU bounds
 * follow observed CPU; memory stays at half to one and a half times current.
 */
export function computeAcceptableRange(
  currentSku: SkuDescriptor,
  instance: InstanceDescriptor,
  policy: ScoringPolicy,
): AcceptableRange {
  const { metrics } = instance;
  const cpuFactor = cpuStretch(metrics.avgCpu, metrics.maxCpu, policy);
  const memoryFactor = 1;

  return {
    minVcpus: Math.max(1, Math.floor(currentSku.vcpus * cpuFactor * 0.5)),
    maxVcpus: Math.floor(currentSku.vcpus * cpuFactor * 1.5),
    minMemoryGb: Math.max(1, currentSku.memoryGb * memoryFactor * 0.5),
    maxMemoryGb: currentSku.memoryGb * memoryFactor * 1.5,
    cpuFactor,
    memoryFactor,
  };
}

function fitScore(ratio: number): number {
  return Math.max(0, 100 - Math.abs(1 - ratio) * 100);
}

export function scoreCandidate(
  candidate: SkuDescriptor,
  currentSku: SkuDescriptor,
  candidateMonthly: number,
  currentMonthly: number,
  policy: ScoringPolicy,
): ScoreBreakdown {
  const price = currentMonthly > 0
    ? Math.max(0, (2 - candidateMonthly / currentMonthly) * 50)
    : 0;

  const vcpuRatio = currentSku.vcpus > 0 ? candidate.vcpus / currentSku.vcpus : 1;
  const memoryRatio = currentSku.memoryGb > 0 ? candidate.memoryGb / currentSku.memoryGb : 1;
  const performance = (fitScore(vcpuRatio) + fitScore(memoryRatio)) / 2;

  const version = getSkuVersion(candidate.name);
  let generation: number;
  if (policy.generation.enabled) {
    const target = getSkuVersion(currentSku.name) + policy.generation.leap;
    generation = Math.max(0, 100 - Math.abs(version - target) * 15);
    if (version >= target) generation = Math.min(100, generation + 10);
  } else {
    generation = Math.min(100, version * 20);
  }

  const features = Math.min(
    100,
    candidate.features.reduce((sum, feature) => sum + (FEATURE_POINTS[feature] ?? 0), 0),
  );

  const { weights } = policy;
  const total = price * weights.price
    + performance * weights.performance
    + generation * weights.generation
    + features * weights.features;

  return { total, price, performance, generation, features };
}

function filterReason(
  sku: SkuDescriptor,
  input: RankingInput,
  range: AcceptableRange,
): SkipReason | undefined {
  const { instance, currentSku, policy } = input;

  if (sku.vcpus < range.minVcpus || sku.vcpus > range.maxVcpus) return 'range';
  if (sku.memoryGb < range.minMemoryGb || sku.memoryGb > range.maxMemoryGb) return 'range';

  if (policy.checkDiskRequirements && sku.maxDataDisks < instance.dataDiskCount) return 'disk';

  if (
    policy.checkNetworkRequirements
    && sku.maxNetworkBandwidthMbps > 0
    && sku.maxNetworkBandwidthMbps < HIGH_BANDWIDTH_MBPS
    && currentSku.maxNetworkBandwidthMbps >= HIGH_BANDWIDTH_MBPS
  ) {
    return 'network';
  }

  if (policy.sameFamilyOnly) {
    const currentFamily = extractFamily(instance.sku);
    const family = extractFamily(sku.name);
    if (currentFamily && family && currentFamily !== family) return 'family';
  }

  if (policy.generation.enabled) {
    const currentVersion = getSkuVersion(instance.sku);
    const version = getSkuVersion(sku.name);
    if (version < currentVersion) return 'generation';
    if (!policy.generation.fallback && version < currentVersion + policy.generation.leap) return 'generation';
  }

  if (!policy.allowBurstable && isBurstable(sku.name)) return 'burstable';

  return undefined;
}

/**
 * Filter, price and score the catalog; returns the best candidates by descending score.
 * Ties keep catalog order.
 */
export async function rankCandidates(input: RankingInput): Promise<RankingOutcome> {
  const { instance, currentSku, catalog, priceOf, policy } = input;
  const range = computeAcceptableRange(currentSku, instance, policy);
  const currentMonthly = instance.priceMonthly ?? 0;
  const skipped: Record<SkipReason, number> = {
    range: 0, disk: 0, network: 0, family: 0, generation: 0, burstable: 0, unpriced: 0,
  };
  const candidates: CandidateResult[] = [];

  for (const sku of catalog) {
    if (sku.name === instance.sku) continue;

    const reason = filterReason(sku, input, range);
    if (reason) {
      skipped[reason]++;
      continue;
    }

    const hourly = await priceOf(sku.name);
    if (!hourly) {
      skipped.unpriced++;
      continue;
    }

    const monthly = hourly * HOURS_PER_MONTH;
    const score = scoreCandidate(sku, currentSku, monthly, currentMonthly, policy);

    candidates.push({
      sku: sku.name,
      vcpus: sku.vcpus,
      memoryGb: sku.memoryGb,
      generation: sku.generation,
      features: sku.features,
      monthlyPrice: roundTo(monthly, 2),
      savings: roundTo(currentMonthly - monthly, 2),
      savingsPercent: currentMonthly > 0 ? roundTo((currentMonthly - monthly) / currentMonthly * 100, 1) : 0,
      score: roundTo(score.total, 2),
      isValid: true,
      validationIssues: [],
    });
  }

  candidates.sort((a, b) => b.score - a.score);

  return { candidates: candidates.slice(0, MAX_RANKED_CANDIDATES), range, skipped };
}
