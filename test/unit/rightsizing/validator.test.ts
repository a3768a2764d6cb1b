import { describe, it, expect, vi } from 'vitest';
import {
  QuotaBackedValidator,
  matchQuota,
  quotaSeriesOf,
  requiredFeaturesOf,
  toQuotaSnapshot,
  validateAndPromote,
  type ConstraintValidator,
  type ValidationRequest,
} from '../../../src/rightsizing/validator.js';
import { SkuCatalogCache } from '../../../src/rightsizing/cache.js';
import { getLogger } from '../../../src/core/logger.js';
import type { ValidationOutcome } from '../../../src/rightsizing/types.js';
import { makeCandidate, makeSku } from '../../helpers/fixtures.js';
import { FakeCloud } from '../../helpers/fake-cloud.js';

const context = { region: 'eastus', requiredFeatures: [] };

function valid(overrides: Partial<ValidationOutcome> = {}): ValidationOutcome {
  return { isValid: true, restrictions: [], warnings: [], ...overrides };
}

function invalid(...restrictions: string[]): ValidationOutcome {
  return { isValid: false, restrictions, warnings: [] };
}

function scripted(outcomes: Record<string, ValidationOutcome | Error>): ConstraintValidator & { seen: string[] } {
  const seen: string[] = [];
  return {
    seen,
    async validate(request: ValidationRequest) {
      seen.push(request.sku);
      const outcome = outcomes[request.sku] ?? valid();
      if (outcome instanceof Error) throw outcome;
      return outcome;
    },
  };
}

describe('validateAndPromote', () => {
  it('should promote the first valid candidate to rank one', async () => {
    const candidates = [makeCandidate('A'), makeCandidate('B'), makeCandidate('C')];
    const validator = scripted({ A: invalid('Location: NotAvailableForSubscription') });

    const outcome = await validateAndPromote(candidates, context, validator, getLogger());

    expect(outcome.candidates.map(c => c.sku)).toEqual(['B', 'A', 'C']);
    expect(outcome.promotedFrom).toBe(1);
    expect(outcome.deploymentFeasible).toBe(true);
    expect(outcome.constraintIssues).toEqual([]);
    expect(outcome.candidates[1].isValid).toBe(false);
    expect(outcome.candidates[1].validationIssues).toEqual(['Location: NotAvailableForSubscription']);
  });

  it('should keep order when the top candidate is valid', async () => {
    const outcome = await validateAndPromote(
      [makeCandidate('A'), makeCandidate('B')], context, scripted({}), getLogger(),
    );

    expect(outcome.candidates.map(c => c.sku)).toEqual(['A', 'B']);
    expect(outcome.promotedFrom).toBeUndefined();
  });

  it('should only validate the top three candidates', async () => {
    const candidates = ['A', 'B', 'C', 'D', 'E'].map(sku => makeCandidate(sku));
    const validator = scripted({ A: invalid('a'), B: invalid('b'), C: invalid('c') });

    const outcome = await validateAndPromote(candidates, context, validator, getLogger());

    expect(validator.seen).toEqual(['A', 'B', 'C']);
    expect(outcome.deploymentFeasible).toBe(false);
    expect(outcome.constraintIssues).toEqual(['a', 'b', 'c']);
    expect(outcome.candidates.map(c => c.sku)).toEqual(['A', 'B', 'C', 'D', 'E']);
    expect(outcome.candidates[3].isValid).toBe(true);
  });

  it('should leave a candidate unchanged when its validation errors', async () => {
    const candidates = [makeCandidate('A'), makeCandidate('B')];
    const validator = scripted({ A: new Error('quota service down'), B: invalid('b') });

    const outcome = await validateAndPromote(candidates, context, validator, getLogger());

    expect(outcome.candidates[0].sku).toBe('A');
    expect(outcome.candidates[0].isValid).toBe(true);
    expect(outcome.deploymentFeasible).toBe(true);
  });

  it('should warn when the top candidate quota is at least 80% used', async () => {
    const quota = { family: 'Standard DSv5 Family vCPUs', used: 85, limit: 100, available: 15, usagePercent: 85 };
    const validator = scripted({ A: valid({ quota, warnings: ['On-demand capacity may be limited for A in eastus'] }) });

    const outcome = await validateAndPromote([makeCandidate('A')], context, validator, getLogger());

    expect(outcome.quotaWarnings).toEqual([
      'Quota warning for A: 85.0% used',
      'On-demand capacity may be limited for A in eastus',
    ]);
  });

  it('should be feasible with nothing to validate', async () => {
    const validate = vi.fn();
    const outcome = await validateAndPromote([], context, { validate }, getLogger());

    expect(outcome.deploymentFeasible).toBe(true);
    expect(validate).not.toHaveBeenCalled();
  });
});

describe('requiredFeaturesOf', () => {
  it('should carry premium storage and accelerated networking only', () => {
    const sku = makeSku('Standard_D4s_v3', { features: ['PremiumStorage', 'EphemeralOSDisk', 'AcceleratedNetworking'] });
    expect(requiredFeaturesOf(sku)).toEqual(['PremiumStorage', 'AcceleratedNetworking']);
  });
});

describe('quota helpers', () => {
  it('should derive the quota series from the size token', () => {
    expect(quotaSeriesOf('Standard_D4s_v5')).toBe('DSv5');
    expect(quotaSeriesOf('Standard_D4as_v5')).toBe('DASv5');
    expect(quotaSeriesOf('Standard_DS2_v2')).toBe('DSv2');
    expect(quotaSeriesOf('Standard_NC4as_T4_v3')).toBe('NCASv3');
    expect(quotaSeriesOf('Standard_F4s')).toBe('FS');
    expect(quotaSeriesOf('Standard_4')).toBeUndefined();
  });

  it('should compute available vCPUs and usage percent', () => {
    expect(toQuotaSnapshot({ family: 'x', used: 90, limit: 100 })).toEqual({
      family: 'x', used: 90, limit: 100, available: 10, usagePercent: 90,
    });
    expect(toQuotaSnapshot({ family: 'x', used: 3, limit: 0 })).toEqual({
      family: 'x', used: 3, limit: 0, available: 0, usagePercent: 0,
    });
  });

  it('should match a family quota, falling back to the regional total', () => {
    const quotas = [
      { family: 'Standard DSv5 Family vCPUs', used: 10, limit: 100 },
      { family: 'Total Regional vCPUs', used: 40, limit: 200 },
    ];

    expect(matchQuota('Standard_D4s_v5', quotas)?.family).toBe('Standard DSv5 Family vCPUs');
    expect(matchQuota('Standard_NC4as_T4_v3', quotas)?.family).toBe('Total Regional vCPUs');
    expect(matchQuota('Standard_NC4as_T4_v3', [quotas[0]])).toBeUndefined();
  });

  it('should match the series as a whole word of the quota name', () => {
    const quotas = [
      { family: 'Standard DSv5 Family vCPUs', used: 10, limit: 100 },
      { family: 'Standard DASv5 Family vCPUs', used: 20, limit: 100 },
      { family: 'Standard NCASv3_T4 Family vCPUs', used: 0, limit: 16 },
    ];

    expect(matchQuota('Standard_D4as_v5', quotas)?.family).toBe('Standard DASv5 Family vCPUs');
    expect(matchQuota('Standard_NC4as_T4_v3', quotas)?.family).toBe('Standard NCASv3_T4 Family vCPUs');
    expect(matchQuota('Standard_D4s_v4', quotas)).toBeUndefined();
  });

  it('should not match a one-letter family inside other words', () => {
    const quotas = [
      { family: 'Standard DSv5 Family vCPUs', used: 10, limit: 100 },
      { family: 'Regional Low-priority vCPUs', used: 0, limit: 100 },
      { family: 'Total Regional vCPUs', used: 40, limit: 200 },
    ];

    expect(matchQuota('Standard_D4_v5', quotas)?.family).toBe('Total Regional vCPUs');
    expect(matchQuota('Standard_E4_v5', quotas)?.family).toBe('Total Regional vCPUs');
  });
});

describe('QuotaBackedValidator', () => {
  function setup(quotaUsed: number) {
    const cloud = new FakeCloud({
      skus: {
        eastus: [
          makeSku('Standard_D4s_v5', { availableZones: ['1', '2'], features: ['PremiumStorage'] }),
          makeSku('Standard_D4as_v5', {
            restrictions: [{ kind: 'Zone', reasonCode: 'NotAvailableForSubscription', zones: ['3'], message: 'Zone: NotAvailableForSubscription' }],
          }),
        ],
      },
      quotas: { eastus: [{ family: 'Standard DSv5 Family vCPUs', used: quotaUsed, limit: 100 }] },
    });
    return { cloud, validator: new QuotaBackedValidator(new SkuCatalogCache(cloud), cloud) };
  }

  it('should accept a SKU with quota, zones and features', async () => {
    const { validator } = setup(10);

    const outcome = await validator.validate({
      sku: 'Standard_D4s_v5', region: 'eastus', requiredVcpus: 4, requiredFeatures: ['PremiumStorage'], requiredZones: ['1'],
    });

    expect(outcome.isValid).toBe(true);
    expect(outcome.quota?.available).toBe(90);
    expect(outcome.zones).toEqual({ available: ['1', '2'], missing: [] });
    expect(outcome.warnings).toEqual([]);
  });

  it('should report every failed constraint', async () => {
    const { validator } = setup(95);

    const outcome = await validator.validate({
      sku: 'Standard_D4s_v5',
      region: 'eastus',
      requiredVcpus: 8,
      requiredFeatures: ['PremiumStorage', 'AcceleratedNetworking'],
      requiredZones: ['1', '3'],
    });

    expect(outcome.isValid).toBe(false);
    expect(outcome.restrictions).toEqual([
      'Insufficient quota: need 8 vCPUs, only 5 available',
      'SKU not available in zones: 3',
      'Missing required features: AcceleratedNetworking',
    ]);
  });

  it('should surface catalog restrictions and a capacity warning', async () => {
    const { validator } = setup(0);

    const outcome = await validator.validate({
      sku: 'Standard_D4as_v5', region: 'eastus', requiredVcpus: 4, requiredFeatures: [],
    });

    expect(outcome.restrictions).toEqual(['Zone: NotAvailableForSubscription']);
    expect(outcome.warnings).toEqual(['On-demand capacity may be limited for Standard_D4as_v5 in eastus']);
  });

  it('should reject a SKU missing from the regional catalog', async () => {
    const { validator } = setup(0);

    const outcome = await validator.validate({
      sku: 'Standard_X1', region: 'eastus', requiredVcpus: 0, requiredFeatures: [],
    });

    expect(outcome.isValid).toBe(false);
    expect(outcome.restrictions).toEqual(['SKU Standard_X1 not found in eastus']);
    expect(outcome.warnings).toEqual([]);
  });

  it('should read quotas once per region', async () => {
    const { cloud, validator } = setup(0);
    const request = { sku: 'Standard_D4s_v5', region: 'East US', requiredVcpus: 2, requiredFeatures: [] };

    await validator.validate(request);
    await validator.validate({ ...request, region: 'eastus' });

    expect(cloud.calls.listQuotas).toEqual(['eastus']);
  });
});
