import pLimit from 'p-limit';
import {
  ConflictError,
  InternalError,
  InvalidArgumentError,
  NotFoundError,
  ServiceUnavailableError,
  describeError,
} from '../errors.js';
import type { Logger } from '../logging.js';
import type { KeywordEntry } from '../types/index.js';
import { formatTimestamp } from '../utils/time.js';
import type { DocumentStore } from './documentStore.js';
import {
  parseVocabularyDocument,
  serializeVocabulary,
  toVocabularyDocument,
  type TierSection,
  type VocabularyDocument,
} from './document.js';
import type { VocabularyExporter } from './exporter.js';
import { TIER_ORDER, TIERS, resolveTier, type TierDocumentKey, type TierId } from './tiers.js';
import {
  countTerms,
  emptyVocabulary,
  hasTerm,
  withMetadata,
  withTerm,
  withoutTerm,
  type Vocabulary,
} from './vocabulary.js';

export interface VocabularyStoreOptions {
  documents: DocumentStore;
  exporter?: VocabularyExporter;
  /** Maintainer recorded when the store has to create the document itself. */
  maintainer?: string;
  now?: () => Date;
  logger?: Logger;
}

export interface VocabularyStats {
  perTierCount: Record<TierId, number>;
  total: number;
  lastUpdated: string;
}

export interface MoveResult {
  from: TierId;
  to: TierId;
  entry: KeywordEntry;
}

export class VocabularyStore {
  private readonly documents: DocumentStore;
  private readonly exporter: VocabularyExporter | undefined;
  private readonly maintainer: string;
  private readonly now: () => Date;
  private readonly logger: Logger | undefined;
  private readonly mutations = pLimit(1);
  private current: Vocabulary | undefined;

  constructor(options: VocabularyStoreOptions) {
    this.documents = options.documents;
    this.exporter = options.exporter;
    this.maintainer = options.maintainer ?? 'unknown';
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  /** Reads the backing document and makes it the live snapshot. */
  async load(): Promise<Vocabulary> {
    let raw: string | null;
    try {
      raw = await this.documents.read();
    } catch (error) {
      throw new ServiceUnavailableError(`Vocabulary document at ${this.documents.location} is unreadable`, {
        cause: error,
      });
    }

    if (raw === null) {
      throw new NotFoundError(`No vocabulary document at ${this.documents.location}`);
    }

    let vocabulary: Vocabulary;
    try {
      vocabulary = parseVocabularyDocument(JSON.parse(raw));
    } catch (error) {
      throw new ServiceUnavailableError(`Vocabulary document at ${this.documents.location} is malformed`, {
        cause: error,
      });
    }

    this.current = vocabulary;
    return vocabulary;
  }

  /** The live snapshot; a missing document counts as a vocabulary with four empty tiers. */
  async snapshot(): Promise<Vocabulary> {
    if (this.current) {
      return this.current;
    }

    try {
      return await this.load();
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger?.(`${error.message}; starting with an empty vocabulary.`);
        const empty = emptyVocabulary({ lastUpdated: '', maintainer: this.maintainer });
        this.current = empty;
        return empty;
      }
      throw error;
    }
  }

  async listAll(): Promise<VocabularyDocument> {
    return toVocabularyDocument(await this.snapshot());
  }

  async getTier(name: string): Promise<TierSection> {
    const tier = resolveTier(name);
    if (!tier) {
      throw new NotFoundError(`Category ${name.toUpperCase()} not found`);
    }
    return toVocabularyDocument(await this.snapshot())[TIERS[tier].documentKey];
  }

  async search(query: string): Promise<Partial<Record<TierDocumentKey, TierSection>>> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      throw new InvalidArgumentError('Query required');
    }

    const vocabulary = await this.snapshot();
    const results: Partial<Record<TierDocumentKey, TierSection>> = {};
    for (const id of TIER_ORDER) {
      const tier = vocabulary.tiers[id];
      const matches = [...tier.keywords].filter(([term]) => term.toLowerCase().includes(needle));
      if (matches.length > 0) {
        results[TIERS[id].documentKey] = {
          description: tier.description,
          keywords: Object.fromEntries(matches),
        };
      }
    }
    return results;
  }

  async stats(): Promise<VocabularyStats> {
    const vocabulary = await this.snapshot();
    const perTierCount = countTerms(vocabulary);
    const total = TIER_ORDER.reduce((sum, id) => sum + perTierCount[id], 0);
    return { perTierCount, total, lastUpdated: vocabulary.metadata.lastUpdated || 'Unknown' };
  }

  async addTerm(tierName: string, term: string, weight: number): Promise<KeywordEntry> {
    const tier = resolveTier(tierName);
    if (!tier) {
      throw new InvalidArgumentError(`Unknown category ${tierName}`);
    }
    const entry = validateEntry(term, weight);

    return this.mutate((vocabulary) => {
      if (hasTerm(vocabulary, tier, entry.term)) {
        throw new ConflictError(`Keyword "${entry.term}" already exists in ${TIERS[tier].documentKey}`);
      }
      return { next: withTerm(vocabulary, tier, entry), result: entry };
    }, `add ${tier}:${entry.term}`);
  }

  async updateTerm(tierName: string, term: string, weight: number): Promise<KeywordEntry> {
    const tier = resolveTier(tierName);
    const entry = validateEntry(term, weight);
    if (!tier) {
      throw new NotFoundError(`Keyword "${entry.term}" not found in ${tierName.toUpperCase()}`);
    }

    return this.mutate((vocabulary) => {
      if (!hasTerm(vocabulary, tier, entry.term)) {
        throw new NotFoundError(`Keyword "${entry.term}" not found in ${TIERS[tier].documentKey}`);
      }
      return { next: withTerm(vocabulary, tier, entry), result: entry };
    }, `update ${tier}:${entry.term}`);
  }

  async deleteTerm(tierName: string, term: string): Promise<string> {
    const tier = resolveTier(tierName);
    const trimmed = term.trim();
    if (!trimmed) {
      throw new InvalidArgumentError('Keyword is required');
    }
    if (!tier) {
      throw new NotFoundError(`Keyword "${trimmed}" not found in ${tierName.toUpperCase()}`);
    }

    return this.mutate((vocabulary) => {
      if (!hasTerm(vocabulary, tier, trimmed)) {
        throw new NotFoundError(`Keyword "${trimmed}" not found in ${TIERS[tier].documentKey}`);
      }
      return { next: withoutTerm(vocabulary, tier, trimmed), result: trimmed };
    }, `delete ${tier}:${trimmed}`);
  }

  /**
   * Moves `term` between tiers. Removal and insertion are applied to one new vocabulary
   * value that is persisted with a single write, so the term is never in neither or both.
   */
  async moveTerm(fromName: string, toName: string, term: string, weight: number): Promise<MoveResult> {
    const from = resolveTier(fromName);
    const to = resolveTier(toName);
    const entry = validateEntry(term, weight);
    if (!from) {
      throw new NotFoundError(`Keyword "${entry.term}" not found in ${fromName.toUpperCase()}`);
    }
    if (!to) {
      throw new InvalidArgumentError(`Unknown category ${toName}`);
    }

    return this.mutate((vocabulary) => {
      if (!hasTerm(vocabulary, from, entry.term)) {
        throw new NotFoundError(`Keyword "${entry.term}" not found in ${TIERS[from].documentKey}`);
      }
      const removed = from === to ? vocabulary : withoutTerm(vocabulary, from, entry.term);
      return { next: withTerm(removed, to, entry), result: { from, to, entry } };
    }, `move ${from}->${to}:${entry.term}`);
  }

  private mutate<T>(apply: (vocabulary: Vocabulary) => { next: Vocabulary; result: T }, label: string): Promise<T> {
    return this.mutations(async () => {
      const { next, result } = apply(await this.snapshot());
      const stamped = withMetadata(next, {
        lastUpdated: formatTimestamp(this.now()),
        maintainer: next.metadata.maintainer || this.maintainer,
      });

      const body = serializeVocabulary(stamped);
      try {
        await this.documents.write(body);
      } catch (error) {
        this.logger?.(`Failed to persist vocabulary (${label}) to ${this.documents.location}: ${describeError(error)}`);
        throw new InternalError(`Failed to persist vocabulary (${label})`, { cause: error });
      }

      // Re-read what was written: JSON objects list integer-like keys first, and the
      // live keyword order has to match the order a later load would produce.
      const committed = parseVocabularyDocument(JSON.parse(body));
      this.current = committed;
      this.logger?.(`Vocabulary updated: ${label}`);
      await this.exportQuietly(committed);
      return result;
    });
  }

  private async exportQuietly(vocabulary: Vocabulary): Promise<void> {
    if (!this.exporter) {
      return;
    }
    try {
      await this.exporter.export(vocabulary);
    } catch (error) {
      this.logger?.(`Vocabulary export failed: ${describeError(error)}`);
    }
  }
}

function validateEntry(term: string, weight: number): KeywordEntry {
  const trimmed = term.trim();
  if (!trimmed) {
    throw new InvalidArgumentError('Keyword is required');
  }
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new InvalidArgumentError(`Weight for "${trimmed}" must be a number greater than 0`);
  }
  return { term: trimmed, weight };
}
