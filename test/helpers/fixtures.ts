/**
 * Builders for domain objects used across the rightsizing suites.
 */

import type {
  AnalysisReport,
  CandidateResult,
  InstanceDescriptor,
  RightsizingResult,
  ScoringPolicy,
  SkuDescriptor,
} from '../../src/rightsizing/types.js';
import { extractFamily } from '../../src/rightsizing/classifier.js';

export function makeSku(name: string, overrides: Partial<SkuDescriptor> = {}): SkuDescriptor {
  return {
    name,
    family: extractFamily(name),
    vcpus: 4,
    memoryGb: 16,
    maxDataDisks: 8,
    maxIops: 6400,
    maxNetworkBandwidthMbps: 0,
    generation: 'V1,V2',
    features: ['PremiumStorage'],
    restrictions: [],
    availableZones: ['1', '2', '3'],
    ...overrides,
  };
}

export function makeInstance(overrides: Partial<InstanceDescriptor> = {}): InstanceDescriptor {
  return {
    id: `rg-app/${overrides.name ?? 'vm-app-01'}`,
    name: 'vm-app-01',
    resourceGroup: 'rg-app',
    region: 'eastus',
    sku: 'Standard_D4s_v3',
    osType: 'Linux',
    tags: {},
    powerState: 'running',
    metrics: {},
    dataDiskCount: 1,
    nicCount: 1,
    ...overrides,
  };
}

export function makeCandidate(sku: string, overrides: Partial<CandidateResult> = {}): CandidateResult {
  return {
    sku,
    vcpus: 4,
    memoryGb: 16,
    generation: 'V1,V2',
    features: [],
    monthlyPrice: 100,
    savings: 40,
    savingsPercent: 28.6,
    score: 70,
    isValid: true,
    validationIssues: [],
    ...overrides,
  };
}

export function makePolicy(overrides: Partial<ScoringPolicy> = {}): ScoringPolicy {
  return {
    cpuThresholdLow: 20,
    cpuThresholdHigh: 80,
    lowUtilizationFactor: 0.5,
    highUtilizationFactor: 1.5,
    checkDiskRequirements: true,
    checkNetworkRequirements: true,
    sameFamilyOnly: false,
    allowBurstable: true,
    generation: { enabled: true, leap: 2, fallback: true },
    weights: { price: 0.35, performance: 0.25, generation: 0.2, features: 0.2 },
    ...overrides,
  };
}

export function makeResult(overrides: Partial<RightsizingResult> = {}): RightsizingResult {
  return {
    instance: makeInstance(),
    currentGeneration: 'v3',
    generationSavings: 0,
    cheaperRegions: [],
    rankedAlternatives: [],
    validatedAlternatives: [],
    constraintIssues: [],
    quotaWarnings: [],
    totalPotentialSavings: 0,
    recommendationType: 'none',
    priority: 'Low',
    deploymentFeasible: true,
    ...overrides,
  };
}

export function makeReport(results: RightsizingResult[], overrides: Partial<AnalysisReport> = {}): AnalysisReport {
  const totalPotentialSavings = results.reduce((sum, result) => sum + result.totalPotentialSavings, 0);
  return {
    id: 'run-1',
    timestamp: '2026-01-15T10:00:00.000Z',
    totalInstances: results.length,
    analyzedInstances: results.length,
    failedInstances: [],
    instancesWithRecommendations: results.filter(result => result.totalPotentialSavings > 0).length,
    totalCurrentCost: results.reduce((sum, result) => sum + (result.instance.priceMonthly ?? 0), 0),
    totalPotentialSavings,
    breakdown: { shutdown: 0, rightsize: 0, generation_upgrade: 0, region_move: 0 },
    results,
    executiveSummary: '',
    ...overrides,
  };
}
