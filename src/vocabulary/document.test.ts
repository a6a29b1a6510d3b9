import { describe, expect, test } from 'vitest';
import { parseVocabularyDocument, serializeVocabulary, toVocabularyDocument } from './document.js';
import { TIERS } from './tiers.js';

describe('parseVocabularyDocument', () => {
  test('fills missing tiers with defaults and keeps stored descriptions', () => {
    const vocabulary = parseVocabularyDocument({
      CRITICAL: { description: '', keywords: { 詐騙: 3 } },
      OPPORTUNITIES: { description: 'Intent', keywords: { 代購: 1.5 } },
    });

    expect(vocabulary.tiers.CRITICAL.description).toBe('');
    expect([...vocabulary.tiers.CRITICAL.keywords]).toEqual([['詐騙', 3]]);
    expect(vocabulary.tiers.OPPORTUNITY.keywords.get('代購')).toBe(1.5);
    expect(vocabulary.tiers.STRATEGIC.description).toBe(TIERS.STRATEGIC.defaultDescription);
    expect(vocabulary.tiers.STRATEGIC.keywords.size).toBe(0);
    expect(vocabulary.metadata).toEqual({ lastUpdated: '', maintainer: '' });
  });

  test('names the offending path for invalid weights', () => {
    expect(() => parseVocabularyDocument({ CRITICAL: { keywords: { 詐騙: -1 } } })).toThrow(
      new TypeError('vocabulary.CRITICAL.keywords["詐騙"] must be greater than 0'),
    );
  });

  test('rejects a document that is not an object', () => {
    expect(() => parseVocabularyDocument([])).toThrow(new TypeError('vocabulary must be an object'));
  });

  test('serialization round-trips', () => {
    const document = {
      CRITICAL: { description: 'Crisis', keywords: { 詐騙: 3, 假貨: 2 } },
      STRATEGIC: { description: 'Loyalty', keywords: {} },
      OPERATIONAL: { description: 'Friction', keywords: { 運費: 1 } },
      OPPORTUNITIES: { description: 'Intent', keywords: { 代購: 1 } },
      metadata: { lastUpdated: '2026-10-01 09:00:00', maintainer: 'ops' },
    };

    const serialized = serializeVocabulary(parseVocabularyDocument(document));

    expect(serialized.endsWith('}\n')).toBe(true);
    expect(JSON.parse(serialized)).toEqual(document);
    expect(toVocabularyDocument(parseVocabularyDocument(JSON.parse(serialized)))).toEqual(document);
  });
});
