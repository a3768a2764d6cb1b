import { describe, it, expect } from 'vitest';
import {
  extractFamily,
  extractGeneration,
  extractVersionNumber,
  getSkuVersion,
  isBurstable,
} from '../../../src/rightsizing/classifier.js';

describe('extractGeneration', () => {
  it.each([
    ['Standard_D4s_v5', 'v5'],
    ['Standard_E16_v3', 'v3'],
    ['Standard_NC4as_T4_v3', 'v3'],
    ['Standard_D2_v2_Promo', 'v2'],
    ['Standard_Dpsv5', 'v5'],
    ['Standard_B2psv2', 'v2'],
  ])('should read %s as %s', (name, expected) => {
    expect(extractGeneration(name)).toBe(expected);
  });

  it.each(['Standard_A2', 'Standard_F4s', 'Standard_B2ms', 'Standard_DS2', 'Standard_D3'])(
    'should treat unversioned %s as v1',
    name => {
      expect(extractGeneration(name)).toBe('v1');
    },
  );

  it('should default to v1 for unrecognised names', () => {
    expect(extractGeneration('')).toBe('v1');
    expect(extractGeneration('custom-size')).toBe('v1');
  });
});

describe('extractFamily', () => {
  it('should return the first letter for single-letter families', () => {
    expect(extractFamily('Standard_D4s_v5')).toBe('D');
    expect(extractFamily('Standard_DS2_v2')).toBe('D');
    expect(extractFamily('Standard_E8s_v4')).toBe('E');
  });

  it('should recognise two-letter subfamilies', () => {
    expect(extractFamily('Standard_NC4as_T4_v3')).toBe('NC');
    expect(extractFamily('Standard_DC2s_v3')).toBe('DC');
    expect(extractFamily('Standard_HB120rs_v3')).toBe('HB');
  });

  it('should return an empty string without the Standard_ prefix', () => {
    expect(extractFamily('Basic_A1')).toBe('');
    expect(extractFamily('')).toBe('');
  });
});

describe('extractVersionNumber', () => {
  it('should take the maximum of a multi-value generation label', () => {
    expect(extractVersionNumber('V1,V2')).toBe(2);
  });

  it('should parse a single label', () => {
    expect(extractVersionNumber('v5')).toBe(5);
  });

  it('should read SKU names through the generation extractor', () => {
    expect(extractVersionNumber('Standard_E8s_v4')).toBe(4);
    expect(extractVersionNumber('Standard_A2')).toBe(1);
  });

  it('should default to 1 for input without a version', () => {
    expect(extractVersionNumber('')).toBe(1);
    expect(extractVersionNumber('gen-unknown')).toBe(1);
  });
});

describe('getSkuVersion', () => {
  it('should return the hardware revision number', () => {
    expect(getSkuVersion('Standard_D4s_v3')).toBe(3);
    expect(getSkuVersion('Standard_D4s_v5')).toBe(5);
    expect(getSkuVersion('Standard_F8s')).toBe(1);
  });
});

describe('isBurstable', () => {
  it('should flag B-series names only', () => {
    expect(isBurstable('Standard_B2s')).toBe(true);
    expect(isBurstable('Standard_B2ms_v2')).toBe(true);
    expect(isBurstable('Standard_D2s_v5')).toBe(false);
  });
});
