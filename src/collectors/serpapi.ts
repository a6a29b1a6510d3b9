import type { CacheClient } from '../cache/cache.js';
import { describeError } from '../errors.js';
import { jot, type InferJot } from '../jot.js';
import type { Logger } from '../logging.js';
import type { ReviewItem } from '../types/index.js';
import { sliceCharacters } from '../utils/text.js';
import type { ReviewCollector } from './collector.js';
import { fetchJson } from './http.js';

const DEFAULT_BASE_URL = 'https://serpapi.com/search';
const QUERY_SUFFIXES = ['評論', '缺點', '品質', '不好', 'review'] as const;
const MAX_SNIPPET_LENGTH = 500;

const organicResultNode = jot.object({
  title: jot.withDefault(jot.string(), ''),
  link: jot.withDefault(jot.string(), ''),
  snippet: jot.withDefault(jot.string(), ''),
});

const searchResponseNode = jot.object({
  organic_results: jot.withDefault(jot.array(organicResultNode), []),
});

type OrganicResult = InferJot<typeof organicResultNode>;

export interface SerpApiCollectorOptions {
  apiKey: string;
  resultsPerQuery?: number;
  language?: string;
  baseUrl?: string;
  cache?: CacheClient;
  cacheMaxAgeMs?: number;
  logger?: Logger;
}

/** Google search results through SerpAPI, one query per complaint-oriented suffix. */
export class SerpApiCollector implements ReviewCollector {
  readonly id = 'serpapi';
  private readonly apiKey: string;
  private readonly resultsPerQuery: number;
  private readonly language: string;
  private readonly baseUrl: string;
  private readonly cache: CacheClient | undefined;
  private readonly cacheMaxAgeMs: number | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: SerpApiCollectorOptions) {
    this.apiKey = options.apiKey;
    this.resultsPerQuery = options.resultsPerQuery ?? 20;
    this.language = options.language ?? 'zh-TW';
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.cache = options.cache;
    this.cacheMaxAgeMs = options.cacheMaxAgeMs;
    this.logger = options.logger;
  }

  async collect(brandName: string, signal: AbortSignal): Promise<ReviewItem[]> {
    const reviews: ReviewItem[] = [];
    for (const query of buildQueries(brandName)) {
      signal.throwIfAborted();
      try {
        const results = await this.search(query, signal);
        this.logger?.(`Query "${query}": ${results.length} result(s).`);
        reviews.push(...results.filter((result) => result.title.trim() !== '').map(toReview));
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        this.logger?.(`Query "${query}" failed: ${describeError(error)}`);
      }
    }
    return reviews;
  }

  private async search(query: string, signal: AbortSignal): Promise<OrganicResult[]> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('q', query);
    url.searchParams.set('engine', 'google');
    url.searchParams.set('num', String(this.resultsPerQuery));
    url.searchParams.set('hl', this.language);
    url.searchParams.set('api_key', this.apiKey);

    const payload = await fetchJson(url, {
      signal,
      cache: this.cache,
      namespace: 'serpapi-search',
      maxAgeMs: this.cacheMaxAgeMs,
      redactedParams: ['api_key'],
    });
    return searchResponseNode.parse(payload, 'serpapi').organic_results;
  }
}

export function buildQueries(brandName: string): string[] {
  const brand = brandName.trim();
  return QUERY_SUFFIXES.map((suffix) => `${brand} ${suffix}`);
}

function toReview(result: OrganicResult): ReviewItem {
  const snippet = sliceCharacters(result.snippet, MAX_SNIPPET_LENGTH);
  return {
    text: snippet ? `${result.title}\n${snippet}` : result.title,
    title: result.title,
    sourceId: 'google',
    url: result.link,
    author: 'Google Search',
  };
}
