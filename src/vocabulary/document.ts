import { jot, type InferJot } from '../jot.js';
import { TIERS, type TierDocumentKey } from './tiers.js';
import { buildVocabulary, type Tier, type Vocabulary } from './vocabulary.js';

const tierSectionNode = jot.object({
  description: jot.withDefault(jot.string(), ''),
  keywords: jot.withDefault(jot.record(jot.number({ positive: true })), {}),
});

const metadataNode = jot.object({
  lastUpdated: jot.withDefault(jot.string(), ''),
  maintainer: jot.withDefault(jot.string(), ''),
});

const documentNode = jot.object({
  CRITICAL: jot.optional(tierSectionNode),
  STRATEGIC: jot.optional(tierSectionNode),
  OPERATIONAL: jot.optional(tierSectionNode),
  OPPORTUNITIES: jot.optional(tierSectionNode),
  metadata: jot.optional(metadataNode),
});

export type TierSection = InferJot<typeof tierSectionNode>;

/** On-disk shape shared with the administration endpoints. */
export type VocabularyDocument = Record<TierDocumentKey, TierSection> & {
  metadata: InferJot<typeof metadataNode>;
};

/**
 * Parses the persisted document. Missing tier sections become empty tiers; anything that
 * is present but malformed throws a `TypeError` naming the offending path.
 */
export function parseVocabularyDocument(raw: unknown): Vocabulary {
  const parsed = documentNode.parse(raw, 'vocabulary');
  return buildVocabulary(
    (id) => {
      const section = parsed[TIERS[id].documentKey];
      return {
        id,
        description: section ? section.description : TIERS[id].defaultDescription,
        keywords: new Map(Object.entries(section?.keywords ?? {})),
      } satisfies Tier;
    },
    {
      lastUpdated: parsed.metadata?.lastUpdated ?? '',
      maintainer: parsed.metadata?.maintainer ?? '',
    },
  );
}

export function toVocabularyDocument(vocabulary: Vocabulary): VocabularyDocument {
  const section = (tier: Tier): TierSection => ({
    description: tier.description,
    keywords: Object.fromEntries(tier.keywords),
  });

  return {
    CRITICAL: section(vocabulary.tiers.CRITICAL),
    STRATEGIC: section(vocabulary.tiers.STRATEGIC),
    OPERATIONAL: section(vocabulary.tiers.OPERATIONAL),
    OPPORTUNITIES: section(vocabulary.tiers.OPPORTUNITY),
    metadata: { ...vocabulary.metadata },
  };
}

export function serializeVocabulary(vocabulary: Vocabulary): string {
  return `${JSON.stringify(toVocabularyDocument(vocabulary), null, 2)}\n`;
}
