import { describe, it, expect } from 'vitest';
import { extractJSON, scanBalancedObject } from '../../../src/ai/response-parser.js';

describe('extractJSON', () => {
  it('should parse a plain JSON object', () => {
    expect(extractJSON('{"recommended_sku": "Standard_D2s_v5", "confidence": "High"}')).toEqual({
      recommended_sku: 'Standard_D2s_v5',
      confidence: 'High',
    });
  });

  it('should parse a fenced json block', () => {
    const text = 'Here is my analysis:\n```json\n{"recommended_sku": "Standard_D2s_v5"}\n```\nLet me know.';
    expect(extractJSON(text)).toEqual({ recommended_sku: 'Standard_D2s_v5' });
  });

  it('should parse a fenced block without a language tag', () => {
    expect(extractJSON('```\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('should find an object wrapped in prose', () => {
    const text = 'Based on the metrics, {"recommended_sku": "Standard_E2s_v5", "nested": {"k": "}"}} is best.';
    expect(extractJSON(text)).toEqual({ recommended_sku: 'Standard_E2s_v5', nested: { k: '}' } });
  });

  it('should return undefined for invalid JSON', () => {
    expect(extractJSON('{invalid json}')).toBeUndefined();
  });

  it('should return undefined when there is no JSON', () => {
    expect(extractJSON('no json here')).toBeUndefined();
  });

  it('should not accept arrays or scalars', () => {
    expect(extractJSON('[1, 2, 3]')).toBeUndefined();
    expect(extractJSON('42')).toBeUndefined();
  });
});

describe('scanBalancedObject', () => {
  it('should respect escaped quotes inside strings', () => {
    expect(scanBalancedObject('x {"a": "say \\"}\\" now"} y')).toBe('{"a": "say \\"}\\" now"}');
  });

  it('should return undefined for an unclosed object', () => {
    expect(scanBalancedObject('{"a": {"b": 1}')).toBeUndefined();
  });
});
