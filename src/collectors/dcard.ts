import type { CacheClient } from '../cache/cache.js';
import { describeError } from '../errors.js';
import { jot, type InferJot, type JotSchema } from '../jot.js';
import type { Logger } from '../logging.js';
import type { ReviewItem } from '../types/index.js';
import { containsIgnoringCase, sliceCharacters } from '../utils/text.js';
import { parseIsoDate } from '../utils/time.js';
import type { ReviewCollector } from './collector.js';
import { fetchJson } from './http.js';

const DEFAULT_BASE_URL = 'https://www.dcard.tw/service/api/v2';
const DEFAULT_FORUMS = ['all', 'recommend', 'shopping', 'bargain'] as const;
const MAX_CONTENT_LENGTH = 500;

const postIdNode: JotSchema<string> = {
  parse(value: unknown, path: string = 'value'): string {
    if (typeof value === 'number' || (typeof value === 'string' && value !== '')) {
      return String(value);
    }
    throw new TypeError(`${path} must be a post id`);
  },
};

const postNode = jot.object({
  id: postIdNode,
  title: jot.withDefault(jot.string(), ''),
  content: jot.optional(jot.string()),
  excerpt: jot.optional(jot.string()),
  createdAt: jot.optional(jot.string()),
  author: jot.optional(jot.object({ name: jot.optional(jot.string()) })),
});

type DcardPost = InferJot<typeof postNode>;

export interface DcardCollectorOptions {
  forums?: readonly string[];
  postsPerForum?: number;
  baseUrl?: string;
  cache?: CacheClient;
  cacheMaxAgeMs?: number;
  logger?: Logger;
}

/**
 * Reads the newest posts of a few Dcard forums and keeps those that mention the brand.
 * Forums are fetched one after another; a forum that fails is logged and skipped.
 */
export class DcardCollector implements ReviewCollector {
  readonly id = 'dcard';
  private readonly forums: readonly string[];
  private readonly postsPerForum: number;
  private readonly baseUrl: string;
  private readonly cache: CacheClient | undefined;
  private readonly cacheMaxAgeMs: number | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: DcardCollectorOptions = {}) {
    this.forums = options.forums ?? DEFAULT_FORUMS;
    this.postsPerForum = options.postsPerForum ?? 30;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.cache = options.cache;
    this.cacheMaxAgeMs = options.cacheMaxAgeMs;
    this.logger = options.logger;
  }

  async collect(brandName: string, signal: AbortSignal): Promise<ReviewItem[]> {
    const reviews: ReviewItem[] = [];
    for (const forum of this.forums) {
      signal.throwIfAborted();
      try {
        const posts = await this.fetchForum(forum, signal);
        const matching = posts.filter((post) => mentionsBrand(post, brandName)).map((post) => toReview(post, forum));
        this.logger?.(`Forum ${forum}: ${matching.length} of ${posts.length} posts mention ${brandName}.`);
        reviews.push(...matching);
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        this.logger?.(`Forum ${forum} failed: ${describeError(error)}`);
      }
    }
    return reviews;
  }

  private async fetchForum(forum: string, signal: AbortSignal): Promise<DcardPost[]> {
    const url = new URL(`${this.baseUrl}/forums/${encodeURIComponent(forum)}/posts`);
    url.searchParams.set('limit', String(this.postsPerForum));
    url.searchParams.set('popular', 'false');

    const payload = await fetchJson(url, {
      signal,
      cache: this.cache,
      namespace: 'dcard-posts',
      maxAgeMs: this.cacheMaxAgeMs,
    });
    if (!Array.isArray(payload)) {
      throw new TypeError(`Dcard forum ${forum} did not return a list of posts`);
    }

    const posts: DcardPost[] = [];
    payload.forEach((raw, index) => {
      try {
        posts.push(postNode.parse(raw, `${forum}[${index}]`));
      } catch (error) {
        this.logger?.(`Skipping malformed post: ${describeError(error)}`);
      }
    });
    return posts;
  }
}

function postBody(post: DcardPost): string {
  return post.content ?? post.excerpt ?? '';
}

function mentionsBrand(post: DcardPost, brandName: string): boolean {
  return containsIgnoringCase(`${post.title} ${postBody(post)}`, brandName.trim());
}

function toReview(post: DcardPost, forum: string): ReviewItem {
  const content = sliceCharacters(postBody(post), MAX_CONTENT_LENGTH);
  const postedAt = parseIsoDate(post.createdAt);
  return {
    text: [post.title, content].filter((part) => part.trim() !== '').join('\n'),
    title: post.title,
    sourceId: 'dcard',
    url: `https://www.dcard.tw/f/${forum}/p/${post.id}`,
    author: post.author?.name || 'Anonymous',
    ...(postedAt ? { postedAt } : {}),
  };
}
