import pLimit from 'p-limit';
import { describeError } from '../errors.js';
import type { Logger } from '../logging.js';
import type { ReviewItem } from '../types/index.js';
import type { CollectorOutcome, ReviewCollector } from './collector.js';

export const DEFAULT_COLLECTOR_CONCURRENCY = 4;
export const DEFAULT_COLLECTOR_TIMEOUT_MS = 10_000;
export const DEFAULT_COLLECTION_DEADLINE_MS = 30_000;

export interface CollectOptions {
  concurrency?: number;
  timeoutMs?: number;
  deadlineMs?: number;
  logger?: Logger;
}

export interface CollectionResult {
  items: ReviewItem[];
  outcomes: CollectorOutcome[];
}

class CollectorTimeoutError extends Error {
  constructor(readonly collectorId: string, readonly timeoutMs: number) {
    super(`Collector ${collectorId} exceeded ${timeoutMs}ms`);
    this.name = 'CollectorTimeoutError';
  }
}

/**
 * Runs every collector once, each under its own timeout, and returns whatever succeeded
 * before the overall deadline. A failing or slow collector only costs its own items.
 * Items are concatenated in collector order, not completion order.
 */
export async function collectReviews(
  collectors: readonly ReviewCollector[],
  brandName: string,
  options: CollectOptions = {},
): Promise<CollectionResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COLLECTOR_TIMEOUT_MS;
  const deadlineMs = options.deadlineMs ?? DEFAULT_COLLECTION_DEADLINE_MS;
  const logger = options.logger;
  const limit = pLimit(options.concurrency ?? DEFAULT_COLLECTOR_CONCURRENCY);
  const outcomes = new Map<number, CollectorOutcome>();
  const inFlight = new Set<AbortController>();
  let expired = false;

  const tasks = collectors.map((collector, index) =>
    limit(async () => {
      if (expired) {
        return;
      }
      const controller = new AbortController();
      inFlight.add(controller);
      try {
        const outcome = await runCollector(collector, brandName, controller, timeoutMs);
        if (!expired) {
          outcomes.set(index, outcome);
          logOutcome(outcome, logger);
        }
      } finally {
        inFlight.delete(controller);
      }
    }),
  );

  let deadlineTimer: NodeJS.Timeout | undefined;
  const deadline = new Promise<'deadline'>((resolve) => {
    deadlineTimer = setTimeout(() => resolve('deadline'), deadlineMs);
  });
  const settled = await Promise.race([Promise.all(tasks).then(() => 'done' as const), deadline]);
  clearTimeout(deadlineTimer);

  if (settled === 'deadline') {
    expired = true;
    limit.clearQueue();
    for (const controller of inFlight) {
      controller.abort();
    }
    logger?.(`Collection deadline of ${deadlineMs}ms passed; continuing with ${outcomes.size} finished collector(s).`);
  }

  const ordered = collectors.map(
    (collector, index): CollectorOutcome =>
      outcomes.get(index) ?? { status: 'timed-out', collectorId: collector.id },
  );
  const items = ordered.flatMap((outcome) => (outcome.status === 'fulfilled' ? outcome.items : []));
  return { items, outcomes: ordered };
}

async function runCollector(
  collector: ReviewCollector,
  brandName: string,
  controller: AbortController,
  timeoutMs: number,
): Promise<CollectorOutcome> {
  // Collectors that ignore the signal still lose the race once it fires.
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  const timer = setTimeout(() => controller.abort(new CollectorTimeoutError(collector.id, timeoutMs)), timeoutMs);

  try {
    const items = await Promise.race([collector.collect(brandName, controller.signal), aborted]);
    return { status: 'fulfilled', collectorId: collector.id, items };
  } catch (error) {
    if (error instanceof CollectorTimeoutError) {
      return { status: 'timed-out', collectorId: collector.id };
    }
    return { status: 'rejected', collectorId: collector.id, error };
  } finally {
    clearTimeout(timer);
  }
}

function logOutcome(outcome: CollectorOutcome, logger: Logger | undefined) {
  switch (outcome.status) {
    case 'fulfilled':
      logger?.(`${outcome.collectorId}: ${outcome.items.length} item(s).`);
      break;
    case 'rejected':
      logger?.(`${outcome.collectorId} failed, skipping: ${describeError(outcome.error)}`);
      break;
    case 'timed-out':
      logger?.(`${outcome.collectorId} timed out, skipping.`);
      break;
  }
}
