import type { CsvRow } from '../csv/writer.js';
import type { AggregateReport, Category, ClassifiedReview, Priority, Sentiment } from '../types/index.js';
import { collapseWhitespace, truncate } from '../utils/text.js';

export const MAX_CONTENT_LENGTH = 300;
export const MAX_TITLE_LENGTH = 50;

export interface ReviewPayload {
  title: string;
  content: string;
  source: string;
  url: string;
  sentiment: Sentiment;
  sentiment_score: number;
  sentiment_confidence: number;
  category: Category;
  priority: Priority;
  keywords: string[];
}

export interface ReportPayload {
  brand_name: string;
  total_reviews: number;
  reviews: ReviewPayload[];
  sentiment_distribution: Record<Sentiment, number>;
  priority_distribution: Record<`${Priority}`, number>;
}

export function toReportPayload(brandName: string, report: AggregateReport): ReportPayload {
  const { priorityDistribution: priorities } = report;
  return {
    brand_name: brandName,
    total_reviews: report.items.length,
    reviews: report.items.map(toReviewPayload),
    sentiment_distribution: { ...report.sentimentDistribution },
    priority_distribution: {
      '1': priorities[1],
      '2': priorities[2],
      '3': priorities[3],
      '4': priorities[4],
      '5': priorities[5],
    },
  };
}

function toReviewPayload({ item, classification }: ClassifiedReview): ReviewPayload {
  const title = item.title?.trim() || truncate(collapseWhitespace(item.text), MAX_TITLE_LENGTH);
  return {
    title,
    content: truncate(item.text.trim(), MAX_CONTENT_LENGTH),
    source: item.sourceId,
    url: item.url,
    sentiment: classification.sentiment,
    sentiment_score: classification.score,
    sentiment_confidence: classification.confidence,
    category: classification.category,
    priority: classification.priority,
    keywords: [...classification.matchedKeywords],
  };
}

export function reportToCsvRows(brandName: string, report: AggregateReport): CsvRow[] {
  return toReportPayload(brandName, report).reviews.map((review, index) => {
    const postedAt = report.items[index]?.item.postedAt;
    return {
      brand: brandName,
      priority: review.priority,
      category: review.category,
      sentiment: review.sentiment,
      sentiment_score: review.sentiment_score,
      sentiment_confidence: review.sentiment_confidence,
      source: review.source,
      posted_at: postedAt ? postedAt.toISOString() : '',
      title: review.title,
      content: review.content,
      keywords: review.keywords.join(' '),
      url: review.url,
    } satisfies CsvRow;
  });
}
