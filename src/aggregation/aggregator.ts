import { classify, type ClassifierVocabulary } from '../classification/priorityClassifier.js';
import { NotFoundError, ReviewRadarError, ServiceUnavailableError } from '../errors.js';
import type { Logger } from '../logging.js';
import type { AggregateReport, ClassifiedReview, Priority, ReviewItem, Sentiment } from '../types/index.js';
import { characterLength } from '../utils/text.js';
import { emptyVocabulary, type Vocabulary } from '../vocabulary/vocabulary.js';

export const MIN_REVIEW_LENGTH = 5;

/**
 * Classifies a batch of reviews against one vocabulary snapshot. Items shorter than
 * `MIN_REVIEW_LENGTH` after trimming are dropped, the first item for each non-empty URL
 * wins, and the result is stably sorted by priority so equal priorities keep input order.
 */
export function aggregate(items: readonly ReviewItem[], vocabulary: ClassifierVocabulary): AggregateReport {
  const seenUrls = new Set<string>();
  const classified: ClassifiedReview[] = [];

  for (const item of items) {
    if (characterLength(item.text.trim()) < MIN_REVIEW_LENGTH) {
      continue;
    }

    const url = item.url.trim();
    if (url) {
      if (seenUrls.has(url)) {
        continue;
      }
      seenUrls.add(url);
    }

    classified.push({ item, classification: classify(item.text, vocabulary) });
  }

  // Array.prototype.sort is stable.
  classified.sort((a, b) => a.classification.priority - b.classification.priority);

  return {
    items: classified,
    sentimentDistribution: countSentiments(classified),
    priorityDistribution: countPriorities(classified),
  };
}

function countSentiments(entries: readonly ClassifiedReview[]): Record<Sentiment, number> {
  const counts: Record<Sentiment, number> = { positive: 0, negative: 0, neutral: 0, suggestion: 0 };
  for (const entry of entries) {
    counts[entry.classification.sentiment] += 1;
  }
  return counts;
}

function countPriorities(entries: readonly ClassifiedReview[]): Record<Priority, number> {
  const counts: Record<Priority, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
  for (const entry of entries) {
    counts[entry.classification.priority] += 1;
  }
  return counts;
}

export interface VocabularySource {
  snapshot(): Promise<Vocabulary>;
}

export class ReviewAggregator {
  constructor(private readonly vocabulary: VocabularySource, private readonly logger?: Logger) {}

  async aggregate(items: readonly ReviewItem[]): Promise<AggregateReport> {
    const snapshot = await this.loadSnapshot();
    const report = aggregate(items, snapshot);
    this.logger?.(`Classified ${report.items.length} of ${items.length} reviews.`);
    return report;
  }

  private async loadSnapshot(): Promise<Vocabulary> {
    try {
      return await this.vocabulary.snapshot();
    } catch (error) {
      if (error instanceof NotFoundError) {
        return emptyVocabulary({ lastUpdated: '', maintainer: '' });
      }
      if (error instanceof ServiceUnavailableError) {
        throw error;
      }
      const message = error instanceof ReviewRadarError ? error.message : 'Vocabulary could not be loaded';
      throw new ServiceUnavailableError(message, { cause: error });
    }
  }
}
