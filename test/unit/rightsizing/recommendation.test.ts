import { describe, it, expect } from 'vitest';
import { isShutdownCandidate, priorityForSavings, selectRecommendation } from '../../../src/rightsizing/recommendation.js';
import { emptyResult, type UtilizationSummary } from '../../../src/rightsizing/types.js';
import { makeCandidate, makeInstance } from '../../helpers/fixtures.js';

function resultFor(metrics: UtilizationSummary = {}, priceMonthly: number | undefined = 300) {
  return emptyResult(makeInstance({ metrics, priceMonthly }));
}

describe('priorityForSavings', () => {
  it('should bucket savings by strict thresholds', () => {
    expect(priorityForSavings(501)).toBe('High');
    expect(priorityForSavings(500)).toBe('Medium');
    expect(priorityForSavings(101)).toBe('Medium');
    expect(priorityForSavings(100)).toBe('Low');
    expect(priorityForSavings(0)).toBe('Low');
  });
});

describe('isShutdownCandidate', () => {
  it('should require both average and peak CPU to be idle', () => {
    expect(isShutdownCandidate(resultFor({ avgCpu: 2, maxCpu: 8 }))).toBe(true);
    expect(isShutdownCandidate(resultFor({ avgCpu: 2, maxCpu: 10 }))).toBe(false);
    expect(isShutdownCandidate(resultFor({ avgCpu: 5, maxCpu: 8 }))).toBe(false);
  });

  it('should not flag instances without metrics', () => {
    expect(isShutdownCandidate(resultFor({}))).toBe(false);
    expect(isShutdownCandidate(resultFor({ avgCpu: 1 }))).toBe(false);
  });
});

describe('selectRecommendation', () => {
  it('should recommend shutdown for idle instances with the full monthly cost', () => {
    const result = resultFor({ avgCpu: 1, maxCpu: 4 }, 80);
    result.generationSavings = 500;

    selectRecommendation(result);

    expect(result.recommendationType).toBe('shutdown');
    expect(result.totalPotentialSavings).toBe(80);
    expect(result.priority).toBe('High');
  });

  it('should count shutdown savings as zero when the price is unknown', () => {
    const result = resultFor({ avgCpu: 1, maxCpu: 4 }, undefined);
    selectRecommendation(result);
    expect(result.totalPotentialSavings).toBe(0);
  });

  it('should pick the largest savings source', () => {
    const result = resultFor({ avgCpu: 40, maxCpu: 70 });
    result.generationSavings = 50;
    result.cheaperRegions = [{ region: 'eastus2', monthlyPrice: 180, savings: 120 }];
    result.rankedAlternatives = [makeCandidate('Standard_D2s_v5', { savings: 90 })];

    selectRecommendation(result);

    expect(result.recommendationType).toBe('region_move');
    expect(result.totalPotentialSavings).toBe(120);
    expect(result.priority).toBe('Medium');
  });

  it('should let the earlier source win a tie', () => {
    const result = resultFor({ avgCpu: 40, maxCpu: 70 });
    result.generationSavings = 90;
    result.rankedAlternatives = [makeCandidate('Standard_D2s_v5', { savings: 90 })];

    selectRecommendation(result);

    expect(result.recommendationType).toBe('generation_upgrade');
    expect(result.totalPotentialSavings).toBe(90);
    expect(result.priority).toBe('Low');
  });

  it('should take advisor and AI savings as rightsize', () => {
    const result = resultFor({ avgCpu: 40, maxCpu: 70 });
    result.advisorHint = {
      id: 'hint-1', instanceName: 'vm-app-01', resourceGroup: 'rg-app', category: 'Cost', impact: 'High',
      problem: 'Underutilized', solution: 'Resize', estimatedSavings: 700,
    };

    selectRecommendation(result);

    expect(result.recommendationType).toBe('rightsize');
    expect(result.totalPotentialSavings).toBe(700);
    expect(result.priority).toBe('High');
  });

  it('should leave type none when nothing saves money', () => {
    const result = resultFor({ avgCpu: 40, maxCpu: 70 });
    result.rankedAlternatives = [makeCandidate('Standard_D8s_v5', { savings: -50 })];

    selectRecommendation(result);

    expect(result.recommendationType).toBe('none');
    expect(result.totalPotentialSavings).toBe(0);
    expect(result.priority).toBe('Low');
  });
});
