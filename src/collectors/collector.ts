import type { ReviewItem } from '../types/index.js';

/**
 * A source of raw reviews for a brand. Implementations should honour `signal`, which is
 * aborted when the collector runs past its timeout.
 */
export interface ReviewCollector {
  readonly id: string;
  collect(brandName: string, signal: AbortSignal): Promise<ReviewItem[]>;
}

export type CollectorOutcome =
  | { status: 'fulfilled'; collectorId: string; items: ReviewItem[] }
  | { status: 'rejected'; collectorId: string; error: unknown }
  | { status: 'timed-out'; collectorId: string };
