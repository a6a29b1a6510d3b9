import { describe, expect, test } from 'vitest';
import { TIER_ORDER, TIERS, documentKeyOf, resolveTier } from './tiers.js';

describe('resolveTier', () => {
  test('accepts ids and document keys in any case', () => {
    expect(resolveTier('critical')).toBe('CRITICAL');
    expect(resolveTier(' Opportunity ')).toBe('OPPORTUNITY');
    expect(resolveTier('opportunities')).toBe('OPPORTUNITY');
    expect(resolveTier('urgent')).toBeUndefined();
  });

  test('documentKeyOf maps aliases to the persisted key', () => {
    expect(documentKeyOf('opportunity')).toBe('OPPORTUNITIES');
    expect(documentKeyOf(' Opportunities ')).toBe('OPPORTUNITIES');
    expect(documentKeyOf('critical')).toBe('CRITICAL');
    expect(documentKeyOf('urgent')).toBe('URGENT');
  });

  test('priorities follow precedence order', () => {
    expect(TIER_ORDER.map((id) => TIERS[id].priority)).toEqual([1, 2, 3, 4]);
  });
});
