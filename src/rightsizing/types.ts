/**
 * Rightsizing domain model: instances, catalog SKUs, ranked candidates,
 * validation outcomes and the aggregated analysis report.
 */

/** Average hours per month used to convert hourly prices */
export const HOURS_PER_MONTH = 730;

export type OsType = 'Linux' | 'Windows';

export interface UtilizationSummary {
  avgCpu?: number;
  maxCpu?: number;
  avgMemory?: number;
  maxMemory?: number;
  avgDiskIops?: number;
  avgNetworkIn?: number;
  avgNetworkOut?: number;
}

/**
 * A running VM. Identity is fixed at discovery; metrics and prices are
 * filled in by the enrichment steps of an analysis run.
 */
export interface InstanceDescriptor {
  readonly id: string;
  readonly name: string;
  readonly resourceGroup: string;
  readonly region: string;
  readonly sku: string;
  readonly osType: OsType;
  readonly tags: Readonly<Record<string, string>>;
  powerState: string;
  metrics: UtilizationSummary;
  dataDiskCount: number;
  nicCount: number;
  priceHourly?: number;
  priceMonthly?: number;
}

export const SKU_FEATURES = [
  'PremiumStorage',
  'AcceleratedNetworking',
  'EphemeralOSDisk',
  'EncryptionAtHost',
  'UltraSSD',
  'SpotCapable',
  'Hibernation',
] as const;

export type SkuFeature = typeof SKU_FEATURES[number];

export type RestrictionKind = 'Location' | 'Zone';

export interface SkuRestriction {
  readonly kind: RestrictionKind;
  readonly reasonCode: string;
  readonly zones: readonly string[];
  readonly message: string;
}

export interface SkuDescriptor {
  readonly name: string;
  readonly family: string;
  readonly vcpus: number;
  readonly memoryGb: number;
  readonly maxDataDisks: number;
  readonly maxIops: number;
  readonly maxNetworkBandwidthMbps: number;
  /** Hypervisor generation label, e.g. "V1,V2" (boot mode, not hardware revision) */
  readonly generation: string;
  readonly features: readonly SkuFeature[];
  readonly restrictions: readonly SkuRestriction[];
  readonly availableZones: readonly string[];
}

export interface CandidateResult {
  sku: string;
  vcpus: number;
  memoryGb: number;
  generation: string;
  features: readonly SkuFeature[];
  monthlyPrice: number;
  savings: number;
  savingsPercent: number;
  score: number;
  isValid: boolean;
  validationIssues: string[];
}

export interface QuotaSnapshot {
  family: string;
  used: number;
  limit: number;
  available: number;
  usagePercent: number;
}

export interface ZoneSnapshot {
  available: string[];
  missing: string[];
}

export interface ValidationOutcome {
  isValid: boolean;
  restrictions: string[];
  quota?: QuotaSnapshot;
  zones?: ZoneSnapshot;
  warnings: string[];
}

export interface RegionAlternative {
  region: string;
  monthlyPrice: number;
  savings: number;
}

/** Advisor-style hint supplied by the inventory side (e.g. a cloud advisor service) */
export interface AdvisorHint {
  id: string;
  instanceName: string;
  resourceGroup: string;
  category: string;
  impact: string;
  problem: string;
  solution: string;
  currentSku?: string;
  recommendedSku?: string;
  estimatedSavings?: number;
}

export type Confidence = 'High' | 'Medium' | 'Low';
export type MigrationComplexity = 'Low' | 'Medium' | 'High';

export interface AIRecommendation {
  instanceName: string;
  currentSku: string;
  recommendedSku: string;
  confidence: Confidence;
  reasoning: string;
  riskAssessment: string;
  estimatedMonthlySavings: number;
  migrationComplexity: MigrationComplexity;
  recommendedActions: string[];
}

/** Requirements a SKU ranking is asked to serve */
export interface WorkloadProfile {
  vcpus: number;
  memoryGb: number;
  region: string;
  osType: OsType;
  /** Free-text description, e.g. "steady web tier" */
  workload?: string;
}

export interface SkuRanking {
  rank: number;
  sku: string;
  /** 0-100 */
  score: number;
  monthlyCost: number;
  strengths: string[];
  weaknesses: string[];
  bestFor: string;
}

export type RecommendationType = 'rightsize' | 'shutdown' | 'generation_upgrade' | 'region_move' | 'none';
export type Priority = 'High' | 'Medium' | 'Low';

export interface RightsizingResult {
  instance: InstanceDescriptor;
  advisorHint?: AdvisorHint;
  aiRecommendation?: AIRecommendation;

  currentGeneration: string;
  recommendedGenerationUpgrade?: string;
  generationSavings: number;

  cheaperRegions: RegionAlternative[];

  /** Top ranked candidates, index 0 is the displayed recommendation */
  rankedAlternatives: CandidateResult[];
  validatedAlternatives: CandidateResult[];
  constraintIssues: string[];
  quotaWarnings: string[];
  /** Set when the current SKU is missing from the regional catalog */
  scoringSkipped?: 'current-sku-not-in-catalog';

  totalPotentialSavings: number;
  recommendationType: RecommendationType;
  priority: Priority;
  deploymentFeasible: boolean;
}

export type CountedRecommendation = Exclude<RecommendationType, 'none'>;

export interface AnalysisReport {
  id: string;
  timestamp: string;
  scope?: string;
  totalInstances: number;
  analyzedInstances: number;
  failedInstances: Array<{ name: string; reason: string }>;
  instancesWithRecommendations: number;
  totalCurrentCost: number;
  totalPotentialSavings: number;
  breakdown: Record<CountedRecommendation, number>;
  results: RightsizingResult[];
  executiveSummary: string;
}

export type AnalysisPhase = 'Discover' | 'Prefetch' | 'AnalyzeAll' | 'Summarize' | 'Done';

export interface ScoringPolicy {
  cpuThresholdLow: number;
  cpuThresholdHigh: number;
  /** Range multiplier when average utilization is below the low threshold */
  lowUtilizationFactor: number;
  /** Range multiplier when peak utilization is above the high threshold */
  highUtilizationFactor: number;
  checkDiskRequirements: boolean;
  checkNetworkRequirements: boolean;
  sameFamilyOnly: boolean;
  allowBurstable: boolean;
  generation: {
    enabled: boolean;
    leap: number;
    fallback: boolean;
  };
  weights: {
    price: number;
    performance: number;
    generation: number;
    features: number;
  };
}

export function emptyResult(instance: InstanceDescriptor): RightsizingResult {
  return {
    instance,
    currentGeneration: '',
    generationSavings: 0,
    cheaperRegions: [],
    rankedAlternatives: [],
    validatedAlternatives: [],
    constraintIssues: [],
    quotaWarnings: [],
    totalPotentialSavings: 0,
    recommendationType: 'none',
    priority: 'Medium',
    deploymentFeasible: true,
  };
}
