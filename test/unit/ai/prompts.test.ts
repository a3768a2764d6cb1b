import { describe, it, expect } from 'vitest';
import {
  MAX_PROMPT_CANDIDATES,
  buildRankingPrompt,
  buildRecommendationPrompt,
  buildSummaryPrompt,
  buildTextSummary,
  type PromptCandidate,
  type SummaryTotals,
} from '../../../src/ai/prompts.js';
import { makeInstance, makeResult, makeSku } from '../../helpers/fixtures.js';

const totals: SummaryTotals = {
  totalInstances: 3,
  analyzedInstances: 2,
  totalCurrentCost: 1234.5,
  totalPotentialSavings: 100,
};

describe('buildRecommendationPrompt', () => {
  const candidates: PromptCandidate[] = Array.from({ length: 25 }, (_, i) => ({
    sku: `sku-${i}-x`,
    vcpus: 2,
    memoryGb: 8,
    generation: 'V2',
    features: [],
  }));

  it('should describe the instance with inferred environment and role', () => {
    const instance = makeInstance({ name: 'prod-sql-01', metrics: { avgCpu: 12.346 } });
    const prompt = buildRecommendationPrompt(instance, candidates, new Map());

    expect(prompt).toContain('"environment": "production"');
    expect(prompt).toContain('"workload_role": "database"');
    expect(prompt).toContain('"avg_cpu_percent": 12.35');
    expect(prompt).toContain('"max_cpu_percent": "N/A"');
    expect(prompt).toContain('"current_monthly_cost": "Unknown"');
  });

  it('should include at most the first candidates with their prices', () => {
    const prompt = buildRecommendationPrompt(makeInstance(), candidates, new Map([['sku-0-x', 0.1]]));

    expect(MAX_PROMPT_CANDIDATES).toBe(20);
    expect(prompt).toContain('"sku-19-x"');
    expect(prompt).not.toContain('"sku-20-x"');
    expect(prompt).toContain('"hourly_price": 0.1');
    expect(prompt).toContain('"monthly_price": 73');
    expect(prompt).toContain('"hourly_price": "Unknown"');
  });

  it('should include the advisor hint when present', () => {
    const prompt = buildRecommendationPrompt(makeInstance(), [], new Map(), {
      id: 'hint-1',
      instanceName: 'vm-app-01',
      resourceGroup: 'rg-app',
      category: 'Cost',
      impact: 'High',
      problem: 'Underutilized',
      solution: 'Resize',
      recommendedSku: 'Standard_D2s_v5',
    });

    expect(prompt).toContain('"recommended_sku": "Standard_D2s_v5"');
    expect(prompt).not.toContain('No advisor recommendation available');
  });

  it('should say when no advisor hint exists', () => {
    const prompt = buildRecommendationPrompt(makeInstance(), [], new Map());
    expect(prompt).toContain('No advisor recommendation available');
  });
});

describe('buildSummaryPrompt', () => {
  it('should list top opportunities and confidence counts', () => {
    const results = [
      makeResult({
        instance: makeInstance({ name: 'vm-a' }),
        recommendedGenerationUpgrade: 'Standard_D4s_v5',
        totalPotentialSavings: 50,
        recommendationType: 'generation_upgrade',
        aiRecommendation: {
          instanceName: 'vm-a',
          currentSku: 'Standard_D4s_v3',
          recommendedSku: 'Standard_D4s_v5',
          confidence: 'High',
          reasoning: '',
          riskAssessment: '',
          estimatedMonthlySavings: 50,
          migrationComplexity: 'Low',
          recommendedActions: [],
        },
      }),
      makeResult({ instance: makeInstance({ name: 'vm-b' }) }),
    ];

    const prompt = buildSummaryPrompt(results, totals);

    expect(prompt).toContain('- vm-a: Standard_D4s_v3 -> Standard_D4s_v5 (generation_upgrade, $50.00/month)');
    expect(prompt).toContain('Instances with savings: 1');
    expect(prompt).toContain('- High: 1');
    expect(prompt).toContain('Current monthly cost: $1,234.50');
  });

  it('should print None without opportunities', () => {
    expect(buildSummaryPrompt([], totals)).toContain('Top savings opportunities:\nNone');
  });
});

describe('buildTextSummary', () => {
  it('should summarize totals deterministically', () => {
    const results = [
      makeResult({ totalPotentialSavings: 60, priority: 'High' }),
      makeResult({ totalPotentialSavings: 40, priority: 'Medium' }),
      makeResult(),
    ];

    const lines = buildTextSummary(results, totals).split('\n');

    expect(lines[0]).toBe('VM Rightsizing Analysis Summary');
    expect(lines).toContain('Instances analyzed: 2 of 3');
    expect(lines).toContain('Instances with savings opportunities: 2');
    expect(lines).toContain('Estimated monthly savings: $100.00');
    expect(lines).toContain('Estimated annual savings: $1,200.00');
    expect(lines).toContain('High priority opportunities: 1');
  });
});

describe('buildRankingPrompt', () => {
  const profile = { vcpus: 4, memoryGb: 16, region: 'eastus', osType: 'Windows' as const };

  it('should describe the workload and price each option', () => {
    const prompt = buildRankingPrompt(
      profile,
      [makeSku('Standard_D4s_v5', { maxIops: 6400 }), makeSku('Standard_D4as_v5')],
      new Map([['Standard_D4s_v5', 0.25]]),
    );

    expect(prompt).toContain('"os_type": "Windows"');
    expect(prompt).toContain('"description": "Not specified"');
    expect(prompt).toContain('"max_iops": 6400');
    expect(prompt).toContain('"monthly_price": 182.5');
    expect(prompt).toContain('"hourly_price": "Unknown"');
    expect(prompt).toContain('"rankings": [');
  });

  it('should include at most the first options', () => {
    const skus = Array.from({ length: 25 }, (_, i) => makeSku(`Standard_D${i + 1}s_v5`));
    const prompt = buildRankingPrompt(profile, skus, new Map());

    expect(prompt).toContain(`"name": "Standard_D${MAX_PROMPT_CANDIDATES}s_v5"`);
    expect(prompt).not.toContain(`"name": "Standard_D${MAX_PROMPT_CANDIDATES + 1}s_v5"`);
  });
});
