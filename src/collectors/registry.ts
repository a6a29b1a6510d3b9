import type { CacheClient } from '../cache/cache.js';
import type { AppConfig } from '../config.js';
import { InvalidArgumentError } from '../errors.js';
import { createLogger } from '../logging.js';
import type { ReviewCollector } from './collector.js';
import { DcardCollector } from './dcard.js';
import { SampleCollector } from './sample.js';
import { SerpApiCollector } from './serpapi.js';

export const COLLECTOR_NAMES = ['dcard', 'serpapi', 'sample'] as const;

export type CollectorName = (typeof COLLECTOR_NAMES)[number];

export function defaultCollectorNames(config: Pick<AppConfig, 'serpApiKey'>): CollectorName[] {
  return config.serpApiKey ? ['dcard', 'serpapi'] : ['dcard'];
}

/** Builds collectors by name. Asking for SerpAPI without a configured key is an error. */
export function createCollectors(
  names: readonly string[],
  config: Pick<AppConfig, 'serpApiKey' | 'cacheMaxAgeMs'>,
  cache?: CacheClient,
): ReviewCollector[] {
  return names.map((name) => {
    const collectorName = COLLECTOR_NAMES.find((candidate) => candidate === name);
    switch (collectorName) {
      case 'dcard':
        return new DcardCollector({ cache, cacheMaxAgeMs: config.cacheMaxAgeMs, logger: createLogger('collector', 'dcard') });
      case 'serpapi':
        if (!config.serpApiKey) {
          throw new InvalidArgumentError('The serpapi collector needs SERPAPI_API_KEY to be set.');
        }
        return new SerpApiCollector({
          apiKey: config.serpApiKey,
          cache,
          cacheMaxAgeMs: config.cacheMaxAgeMs,
          logger: createLogger('collector', 'serpapi'),
        });
      case 'sample':
        return new SampleCollector();
      case undefined:
        throw new InvalidArgumentError(`Unknown collector "${name}". Expected one of ${COLLECTOR_NAMES.join(', ')}.`);
    }
  });
}
