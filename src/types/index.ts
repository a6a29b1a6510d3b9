export type Sentiment = 'positive' | 'negative' | 'neutral' | 'suggestion';

export type Category = 'critical' | 'strategic' | 'operational' | 'opportunity' | 'neutral';

export type Priority = 1 | 2 | 3 | 4 | 5;

export interface KeywordEntry {
  term: string;
  weight: number;
}

export interface ReviewItem {
  text: string;
  sourceId: string;
  url: string;
  author: string;
  postedAt?: Date;
  title?: string;
}

export interface ClassificationResult {
  sourceText: string;
  sentiment: Sentiment;
  score: number;
  confidence: number;
  category: Category;
  priority: Priority;
  matchedKeywords: string[];
}

export interface ClassifiedReview {
  item: ReviewItem;
  classification: ClassificationResult;
}

export interface AggregateReport {
  items: ClassifiedReview[];
  sentimentDistribution: Record<Sentiment, number>;
  priorityDistribution: Record<Priority, number>;
}
