/**
 * Constraint validation and promotion.
 *
 * Only the top few ranked candidates are checked against restrictions,
 * quota and zones. The first one confirmed deployable moves to rank 1.
 */

import type { Logger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import type { QuotaCollaborator, QuotaUsage } from '../collaborators/types.js';
import type { SkuCatalogCache } from './cache.js';
import { normalizeRegion } from './cache.js';
import type {
  CandidateResult,
  QuotaSnapshot,
  SkuDescriptor,
  SkuFeature,
  ValidationOutcome,
} from './types.js';

export const VALIDATED_CANDIDATES = 3;
export const QUOTA_WARNING_PERCENT = 80;

/** Current-SKU features a replacement must keep */
const CARRIED_FEATURES: readonly SkuFeature[] = ['PremiumStorage', 'AcceleratedNetworking'];

export interface ValidationRequest {
  sku: string;
  region: string;
  requiredVcpus: number;
  requiredFeatures: readonly SkuFeature[];
  requiredZones?: readonly string[];
}

export interface ConstraintValidator {
  validate(request: ValidationRequest): Promise<ValidationOutcome>;
}

export interface PromotionContext {
  region: string;
  requiredFeatures: readonly SkuFeature[];
  requiredZones?: readonly string[];
}

export interface PromotionOutcome {
  candidates: CandidateResult[];
  deploymentFeasible: boolean;
  constraintIssues: string[];
  quotaWarnings: string[];
  /** Original rank of the candidate moved to the top, when one was */
  promotedFrom?: number;
}

export function requiredFeaturesOf(currentSku: SkuDescriptor): SkuFeature[] {
  return currentSku.features.filter(feature => CARRIED_FEATURES.includes(feature));
}

/**
 * Validate the top candidates in rank order and promote the first valid one.
 *
 * A validator error leaves the candidate as it was: not being able to check
 * is not evidence that the SKU is blocked.
 */
export async function validateAndPromote(
  candidates: readonly CandidateResult[],
  context: PromotionContext,
  validator: ConstraintValidator,
  logger: Logger,
): Promise<PromotionOutcome> {
  const ranked = [...candidates];
  const outcomes = new Map<CandidateResult, ValidationOutcome>();
  const restrictionMessages: string[] = [];

  for (const candidate of ranked.slice(0, VALIDATED_CANDIDATES)) {
    let outcome: ValidationOutcome;
    try {
      outcome = await validator.validate({
        sku: candidate.sku,
        region: context.region,
        requiredVcpus: candidate.vcpus,
        requiredFeatures: context.requiredFeatures,
        requiredZones: context.requiredZones,
      });
    } catch (err) {
      logger.warn(
        { sku: candidate.sku, region: context.region, error: toError(err).message },
        'Constraint validation failed, keeping candidate unconfirmed',
      );
      continue;
    }

    outcomes.set(candidate, outcome);
    candidate.isValid = outcome.isValid;
    if (!outcome.isValid) {
      candidate.validationIssues.push(...outcome.restrictions);
      restrictionMessages.push(...outcome.restrictions);
    }
  }

  const checked = Math.min(VALIDATED_CANDIDATES, ranked.length);
  const firstValid = ranked.slice(0, checked).findIndex(candidate => candidate.isValid);

  let promotedFrom: number | undefined;
  if (firstValid > 0) {
    const [promoted] = ranked.splice(firstValid, 1);
    ranked.unshift(promoted);
    promotedFrom = firstValid;
    logger.debug({ sku: promoted.sku, from: firstValid }, 'Promoted first deployable candidate');
  }

  const deploymentFeasible = checked === 0 || firstValid >= 0;
  const constraintIssues = deploymentFeasible ? [] : restrictionMessages;
  const quotaWarnings: string[] = [];

  const top = ranked[0];
  const topOutcome = top ? outcomes.get(top) : undefined;
  if (top && topOutcome) {
    if (topOutcome.quota && topOutcome.quota.usagePercent >= QUOTA_WARNING_PERCENT) {
      quotaWarnings.push(`Quota warning for ${top.sku}: ${topOutcome.quota.usagePercent.toFixed(1)}% used`);
    }
    quotaWarnings.push(...topOutcome.warnings);
  }

  return { candidates: ranked, deploymentFeasible, constraintIssues, quotaWarnings, promotedFrom };
}

/**
 * Quota series named by a SKU: family letters, upper-cased size suffix and
 * hardware version. Standard_D4s_v5 -> DSv5, Standard_NC4as_T4_v3 -> NCASv3,
 * Standard_F4s -> FS. Undefined when the name has no size token.
 */
export function quotaSeriesOf(sku: string): string | undefined {
  const [size, ...rest] = sku.replace(/^Standard_/, '').split('_');
  const match = /^([A-Za-z]+)\d+([a-z]*)$/.exec(size);
  if (!match) return undefined;
  const version = rest.find(part => /^v\d+$/.test(part)) ?? '';
  return `${match[1]}${match[2].toUpperCase()}${version}`;
}

export function toQuotaSnapshot(usage: QuotaUsage): QuotaSnapshot {
  return {
    family: usage.family,
    used: usage.used,
    limit: usage.limit,
    available: Math.max(0, usage.limit - usage.used),
    usagePercent: usage.limit > 0 ? usage.used / usage.limit * 100 : 0,
  };
}

/**
 * Family quota for a SKU, falling back to the regional total vCPU quota.
 * The series must appear as a whole word of the quota name, so a one-letter
 * family never matches inside "Standard" or "Regional".
 */
export function matchQuota(sku: string, quotas: readonly QuotaUsage[]): QuotaUsage | undefined {
  const series = quotaSeriesOf(sku);
  const word = series ? new RegExp(`(?<![A-Za-z0-9])${series}(?![A-Za-z0-9])`, 'i') : undefined;
  return (word ? quotas.find(quota => word.test(quota.family)) : undefined)
    ?? quotas.find(quota => {
      const name = quota.family.toLowerCase();
      return name.includes('total') && name.includes('vcpu');
    });
}

/**
 * Validator backed by the regional catalog (restrictions, zones, features)
 * and the quota collaborator. Quotas are read once per region per run.
 */
export class QuotaBackedValidator implements ConstraintValidator {
  private quotas = new Map<string, Promise<QuotaUsage[]>>();

  constructor(
    private readonly catalog: SkuCatalogCache,
    private readonly quotaSource: QuotaCollaborator,
  ) {}

  async validate(request: ValidationRequest): Promise<ValidationOutcome> {
    const { sku, region, requiredVcpus, requiredFeatures, requiredZones } = request;
    const skus = await this.catalog.get(region);
    const descriptor = skus.find(entry => entry.name === sku);

    const restrictions: string[] = [];
    const warnings: string[] = [];
    let quota: QuotaSnapshot | undefined;
    let zones: ValidationOutcome['zones'];

    if (!descriptor) {
      restrictions.push(`SKU ${sku} not found in ${region}`);
    }
    for (const restriction of descriptor?.restrictions ?? []) {
      restrictions.push(restriction.message);
    }

    if (requiredVcpus > 0) {
      const usage = matchQuota(sku, await this.quotasFor(region));
      if (usage) {
        quota = toQuotaSnapshot(usage);
        if (quota.available < requiredVcpus) {
          restrictions.push(`Insufficient quota: need ${requiredVcpus} vCPUs, only ${quota.available} available`);
        }
      }
    }

    if (requiredZones && requiredZones.length > 0) {
      const available = descriptor ? [...descriptor.availableZones] : [];
      const missing = requiredZones.filter(zone => !available.includes(zone));
      zones = { available, missing };
      if (missing.length > 0) {
        restrictions.push(`SKU not available in zones: ${missing.join(', ')}`);
      }
    }

    if (requiredFeatures.length > 0) {
      const supported = descriptor?.features ?? [];
      const missing = requiredFeatures.filter(feature => !supported.includes(feature));
      if (missing.length > 0) {
        restrictions.push(`Missing required features: ${missing.join(', ')}`);
      }
    }

    if (descriptor && descriptor.restrictions.length > 0) {
      warnings.push(`On-demand capacity may be limited for ${sku} in ${region}`);
    }

    return { isValid: restrictions.length === 0, restrictions, quota, zones, warnings };
  }

  private quotasFor(region: string): Promise<QuotaUsage[]> {
    const key = normalizeRegion(region);
    let pending = this.quotas.get(key);
    if (!pending) {
      pending = this.quotaSource.listQuotas(key).catch((err: unknown) => {
        this.quotas.delete(key);
        throw toError(err);
      });
      this.quotas.set(key, pending);
    }
    return pending;
  }
}
