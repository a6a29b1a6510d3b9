import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { jot, type InferJot } from '../jot.js';
import type { ReviewItem } from '../types/index.js';
import type { ReviewCollector } from './collector.js';

const DEFAULT_SAMPLE_PATH = fileURLToPath(new URL('../../data/sample-reviews.json', import.meta.url));
const DAY_MS = 24 * 60 * 60 * 1000;

const sampleNode = jot.record(
  jot.array(
    jot.object({
      title: jot.string(),
      content: jot.string(),
      author: jot.string(),
      source: jot.string(),
    }),
  ),
);

type SampleBook = InferJot<typeof sampleNode>;

export interface SampleCollectorOptions {
  filePath?: string;
  now?: () => number;
}

/** Bundled reviews for a handful of brands, for demos without network access. */
export class SampleCollector implements ReviewCollector {
  readonly id = 'sample';
  private readonly filePath: string;
  private readonly now: () => number;
  private samples: SampleBook | undefined;

  constructor(options: SampleCollectorOptions = {}) {
    this.filePath = options.filePath ?? DEFAULT_SAMPLE_PATH;
    this.now = options.now ?? Date.now;
  }

  async collect(brandName: string): Promise<ReviewItem[]> {
    const samples = await this.load();
    const entries = samples[brandName.trim()] ?? [];
    return entries.map((entry, index) => ({
      text: `${entry.title}\n${entry.content}`,
      title: entry.title,
      sourceId: entry.source,
      url: `https://sample.invalid/review/${encodeURIComponent(brandName.trim())}/${index}`,
      author: entry.author,
      postedAt: new Date(this.now() - index * 2 * DAY_MS),
    }));
  }

  private async load(): Promise<SampleBook> {
    if (!this.samples) {
      const raw = await fs.readFile(this.filePath, 'utf8');
      this.samples = sampleNode.parse(JSON.parse(raw), this.filePath);
    }
    return this.samples;
  }
}
