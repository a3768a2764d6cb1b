import { z } from 'zod';
import type { AnalysisPhase, RightsizingResult } from '../rightsizing/types.js';

// ===== Configuration =====

export const ScoringWeightsSchema = z.object({
  price: z.number().min(0).max(1).default(0.35),
  performance: z.number().min(0).max(1).default(0.25),
  generation: z.number().min(0).max(1).default(0.20),
  features: z.number().min(0).max(1).default(0.20),
}).refine(
  w => Math.abs(w.price + w.performance + w.generation + w.features - 1) <= 0.001,
  { message: 'Scoring weights must sum to 1.0' },
);

export const RightsizerConfigSchema = z.object({
  analysis: z.object({
    lookbackDays: z.number().int().min(1).max(90).default(30),
    cpuThresholdLow: z.number().min(0).max(100).default(20),
    cpuThresholdHigh: z.number().min(0).max(100).default(80),
    lowUtilizationFactor: z.number().positive().default(0.5),
    highUtilizationFactor: z.number().positive().default(1.5),
    includeMetrics: z.boolean().default(true),
    includeAi: z.boolean().default(true),
    validateConstraints: z.boolean().default(true),
  }).default({}),
  filters: z.object({
    checkDiskRequirements: z.boolean().default(true),
    checkNetworkRequirements: z.boolean().default(true),
    sameFamilyOnly: z.boolean().default(false),
    allowBurstable: z.boolean().default(true),
  }).default({}),
  generation: z.object({
    /** Prefer newer hardware generations when ranking candidates */
    evolveEnabled: z.boolean().default(true),
    /** How many generations ahead of the current SKU to aim for */
    leap: z.number().int().min(1).max(3).default(2),
    /** Accept candidates between current and target generation */
    fallback: z.boolean().default(true),
  }).default({}),
  weights: ScoringWeightsSchema.default({}),
  concurrency: z.object({
    workers: z.number().int().min(1).max(64).default(10),
    aiPermits: z.number().int().min(1).max(32).default(5),
    instanceTimeoutMs: z.number().int().positive().default(60_000),
    batchTimeoutMs: z.number().int().positive().default(300_000),
  }).default({}),
  ai: z.object({
    provider: z.enum(['anthropic', 'openai']).default('anthropic'),
    model: z.string().optional(),
    anthropicApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
    maxTokens: z.number().int().positive().default(2000),
    summaryMaxTokens: z.number().int().positive().default(1000),
    maxRetries: z.number().int().min(0).max(5).default(2),
    baseDelayMs: z.number().int().min(0).default(1000),
  }).default({}),
});

export type RightsizerConfig = z.infer<typeof RightsizerConfigSchema>;
export type RightsizerConfigInput = z.input<typeof RightsizerConfigSchema>;
export type ScoringWeights = z.infer<typeof ScoringWeightsSchema>;

// ===== Events =====

export interface RightsizerEvents {
  'run:phase': { runId: string; phase: AnalysisPhase; timestamp: number };
  'instance:analyzed': { runId: string; instance: string; result: RightsizingResult; durationMs: number };
  'instance:failed': { runId: string; instance: string; reason: string };
  'prefetch:miss': { runId: string; kind: 'catalog' | 'price'; key: string; error: string };
}
