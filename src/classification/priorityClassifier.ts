import type { Category, ClassificationResult, Priority, Sentiment } from '../types/index.js';
import { characterLength } from '../utils/text.js';
import { TIER_ORDER, TIERS, type TierId } from '../vocabulary/tiers.js';
import type { Tier } from '../vocabulary/vocabulary.js';
import { mentionsCustomerService } from './markers.js';

export const MAX_MATCHED_KEYWORDS = 8;
export const MAX_CONFIDENCE = 0.95;
const MIN_CLASSIFIABLE_LENGTH = 2;

/** The part of a vocabulary the classifier reads. Missing tiers are treated as empty. */
export interface ClassifierVocabulary {
  readonly tiers: Partial<Readonly<Record<TierId, Pick<Tier, 'keywords'>>>>;
}

interface Outcome {
  sentiment: Sentiment;
  score: number;
  confidence: number;
  category: Category;
  priority: Priority;
}

const DEGENERATE: Outcome = { sentiment: 'neutral', score: 0.5, confidence: 0, category: 'neutral', priority: 5 };
const UNMATCHED: Outcome = { sentiment: 'neutral', score: 0.5, confidence: 0.3, category: 'neutral', priority: 5 };

/**
 * Classifies `text` against the keyword tiers. Each tier's score is the summed weight of
 * its terms found in the text; the first tier in precedence order with a positive score
 * decides the outcome, and lower tiers only contribute to `matchedKeywords`.
 *
 * Matching is plain substring containment after lower-casing both sides, so a term can
 * match inside a longer word and CJK text is compared exactly.
 */
export function classify(text: string, vocabulary: ClassifierVocabulary): ClassificationResult {
  if (characterLength(text.trim()) < MIN_CLASSIFIABLE_LENGTH) {
    return { sourceText: text, ...DEGENERATE, matchedKeywords: [] };
  }

  const normalized = text.toLowerCase();
  const matchedKeywords: string[] = [];
  let resolved: TierId | undefined;

  for (const id of TIER_ORDER) {
    const keywords = vocabulary.tiers[id]?.keywords;
    if (!keywords) {
      continue;
    }

    let tierScore = 0;
    for (const [term, weight] of keywords) {
      const needle = term.trim().toLowerCase();
      if (needle && normalized.includes(needle)) {
        tierScore += weight;
        matchedKeywords.push(`${id}:${term}`);
      }
    }

    if (resolved === undefined && tierScore > 0) {
      resolved = id;
    }
  }

  const outcome = resolved === undefined ? UNMATCHED : outcomeFor(resolved, normalized);
  return {
    sourceText: text,
    ...outcome,
    confidence: Math.min(outcome.confidence, MAX_CONFIDENCE),
    matchedKeywords: matchedKeywords.slice(0, MAX_MATCHED_KEYWORDS),
  };
}

function outcomeFor(tier: TierId, normalizedText: string): Outcome {
  const { priority, category } = TIERS[tier];
  switch (tier) {
    case 'CRITICAL':
      return { sentiment: 'negative', score: 0.15, confidence: 0.95, category, priority };
    case 'STRATEGIC':
      return mentionsCustomerService(normalizedText)
        ? { sentiment: 'negative', score: 0.35, confidence: 0.8, category, priority }
        : { sentiment: 'neutral', score: 0.5, confidence: 0.8, category, priority };
    case 'OPERATIONAL':
      return { sentiment: 'neutral', score: 0.5, confidence: 0.7, category, priority };
    case 'OPPORTUNITY':
      return { sentiment: 'positive', score: 0.85, confidence: 0.85, category, priority };
  }
}
