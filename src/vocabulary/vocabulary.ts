import type { KeywordEntry } from '../types/index.js';
import { TIER_ORDER, TIERS, type TierId } from './tiers.js';

export interface Tier {
  id: TierId;
  description: string;
  keywords: ReadonlyMap<string, number>;
}

export interface VocabularyMetadata {
  lastUpdated: string;
  maintainer: string;
}

/**
 * Immutable snapshot of the keyword tiers. Every mutation produces a new value, so a
 * snapshot handed to the classifier never changes underneath it.
 */
export interface Vocabulary {
  tiers: Readonly<Record<TierId, Tier>>;
  metadata: VocabularyMetadata;
}

export function emptyVocabulary(metadata: VocabularyMetadata): Vocabulary {
  return buildVocabulary(
    (id) => ({ id, description: TIERS[id].defaultDescription, keywords: new Map() }),
    metadata,
  );
}

export function buildVocabulary(tierFor: (id: TierId) => Tier, metadata: VocabularyMetadata): Vocabulary {
  const tiers: Record<TierId, Tier> = {
    CRITICAL: tierFor('CRITICAL'),
    STRATEGIC: tierFor('STRATEGIC'),
    OPERATIONAL: tierFor('OPERATIONAL'),
    OPPORTUNITY: tierFor('OPPORTUNITY'),
  };
  return { tiers, metadata: { ...metadata } };
}

export function hasTerm(vocabulary: Vocabulary, tier: TierId, term: string): boolean {
  return vocabulary.tiers[tier].keywords.has(term);
}

/** Returns a copy of `vocabulary` with `term` set in `tier`; existing terms keep their position. */
export function withTerm(vocabulary: Vocabulary, tier: TierId, entry: KeywordEntry): Vocabulary {
  const keywords = new Map(vocabulary.tiers[tier].keywords);
  keywords.set(entry.term, entry.weight);
  return replaceTier(vocabulary, tier, keywords);
}

export function withoutTerm(vocabulary: Vocabulary, tier: TierId, term: string): Vocabulary {
  const keywords = new Map(vocabulary.tiers[tier].keywords);
  keywords.delete(term);
  return replaceTier(vocabulary, tier, keywords);
}

export function withMetadata(vocabulary: Vocabulary, metadata: Partial<VocabularyMetadata>): Vocabulary {
  return { tiers: vocabulary.tiers, metadata: { ...vocabulary.metadata, ...metadata } };
}

export function countTerms(vocabulary: Vocabulary): Record<TierId, number> {
  return {
    CRITICAL: vocabulary.tiers.CRITICAL.keywords.size,
    STRATEGIC: vocabulary.tiers.STRATEGIC.keywords.size,
    OPERATIONAL: vocabulary.tiers.OPERATIONAL.keywords.size,
    OPPORTUNITY: vocabulary.tiers.OPPORTUNITY.keywords.size,
  };
}

export function orderedTiers(vocabulary: Vocabulary): Tier[] {
  return TIER_ORDER.map((id) => vocabulary.tiers[id]);
}

function replaceTier(vocabulary: Vocabulary, id: TierId, keywords: Map<string, number>): Vocabulary {
  return buildVocabulary(
    (current) => (current === id ? { ...vocabulary.tiers[current], keywords } : vocabulary.tiers[current]),
    vocabulary.metadata,
  );
}
