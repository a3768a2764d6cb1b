/**
 * Maps raw catalog records (string capability pairs, restriction records and
 * per-location zone info, as the cloud's resource-SKU listing returns them)
 * into closed SkuDescriptors. Capabilities not listed here are dropped.
 */

import { z } from 'zod';
import { normalizeRegion } from '../rightsizing/cache.js';
import type { RestrictionKind, SkuDescriptor, SkuFeature, SkuRestriction } from '../rightsizing/types.js';

export const RawSkuRecordSchema = z.object({
  name: z.string(),
  family: z.string().optional(),
  resourceType: z.string().default('virtualMachines'),
  capabilities: z.array(z.object({ name: z.string(), value: z.string() })).default([]),
  restrictions: z.array(z.object({
    type: z.string(),
    reasonCode: z.string().optional(),
    values: z.array(z.string()).optional(),
    restrictionInfo: z.object({
      locations: z.array(z.string()).optional(),
      zones: z.array(z.string()).optional(),
    }).optional(),
  })).default([]),
  locationInfo: z.array(z.object({
    location: z.string(),
    zones: z.array(z.string()).default([]),
  })).default([]),
});

export type RawSkuRecord = z.infer<typeof RawSkuRecordSchema>;

type NumericField = 'vcpus' | 'memoryGb' | 'maxDataDisks' | 'maxIops' | 'maxNetworkBandwidthMbps';

const NUMERIC_CAPABILITIES: Record<string, NumericField> = {
  vCPUs: 'vcpus',
  MemoryGB: 'memoryGb',
  MaxDataDiskCount: 'maxDataDisks',
  UncachedDiskIOPS: 'maxIops',
  MaxNetworkBandwidthMbps: 'maxNetworkBandwidthMbps',
};

const FEATURE_CAPABILITIES: Record<string, SkuFeature> = {
  PremiumIO: 'PremiumStorage',
  AcceleratedNetworkingEnabled: 'AcceleratedNetworking',
  EphemeralOSDiskSupported: 'EphemeralOSDisk',
  EncryptionAtHostSupported: 'EncryptionAtHost',
  UltraSSDAvailable: 'UltraSSD',
  LowPriorityCapable: 'SpotCapable',
  HibernationSupported: 'Hibernation',
};

function toNumber(value: string): number {
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function restrictionsFor(raw: RawSkuRecord, region: string): SkuRestriction[] {
  const restrictions: SkuRestriction[] = [];

  for (const restriction of raw.restrictions) {
    const reasonCode = (restriction.reasonCode ?? '').replace(/\s+/g, '');
    const locations = [...(restriction.values ?? []), ...(restriction.restrictionInfo?.locations ?? [])];

    let kind: RestrictionKind;
    let zones: string[] = [];
    if (restriction.type === 'Location') {
      if (!locations.some(location => normalizeRegion(location) === region)) continue;
      kind = 'Location';
    } else if (restriction.type === 'Zone') {
      zones = restriction.restrictionInfo?.zones ?? [];
      if (zones.length === 0) continue;
      kind = 'Zone';
    } else {
      continue;
    }

    restrictions.push({ kind, reasonCode, zones, message: `${restriction.type}: ${reasonCode}` });
  }

  return restrictions;
}

/**
 * Descriptor for one region, or undefined for records that are not VM sizes.
 */
export function mapSkuCapabilities(raw: RawSkuRecord, region: string): SkuDescriptor | undefined {
  if (raw.resourceType !== 'virtualMachines') return undefined;

  const key = normalizeRegion(region);
  const numbers: Record<NumericField, number> = {
    vcpus: 0, memoryGb: 0, maxDataDisks: 0, maxIops: 0, maxNetworkBandwidthMbps: 0,
  };
  const features: SkuFeature[] = [];
  let generation = 'Unknown';

  for (const { name, value } of raw.capabilities) {
    if (name === 'HyperVGenerations') {
      generation = value;
      continue;
    }
    if (Object.hasOwn(NUMERIC_CAPABILITIES, name)) {
      numbers[NUMERIC_CAPABILITIES[name]] = toNumber(value);
      continue;
    }
    if (Object.hasOwn(FEATURE_CAPABILITIES, name) && value.toLowerCase() === 'true') {
      features.push(FEATURE_CAPABILITIES[name]);
    }
  }

  const restrictions = restrictionsFor(raw, key);
  const blockedZones = new Set(restrictions.flatMap(restriction => restriction.zones));
  const availableZones = raw.locationInfo
    .filter(info => normalizeRegion(info.location) === key)
    .flatMap(info => info.zones)
    .filter(zone => !blockedZones.has(zone))
    .sort();

  return {
    name: raw.name,
    family: raw.family ?? '',
    ...numbers,
    generation,
    features,
    restrictions,
    availableZones: [...new Set(availableZones)],
  };
}

/** Location restrictions, or a subscription block, make a SKU undeployable in the region */
export function isRestricted(sku: SkuDescriptor): boolean {
  return sku.restrictions.some(
    restriction => restriction.kind === 'Location' || restriction.reasonCode === 'NotAvailableForSubscription',
  );
}
