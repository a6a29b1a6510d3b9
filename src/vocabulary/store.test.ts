import { describe, expect, test, vi } from 'vitest';
import {
  ConflictError,
  InternalError,
  InvalidArgumentError,
  NotFoundError,
  ServiceUnavailableError,
} from '../errors.js';
import type { DocumentStore } from './documentStore.js';
import type { VocabularyExporter } from './exporter.js';
import { VocabularyStore } from './store.js';
import { TIERS } from './tiers.js';
import type { Vocabulary } from './vocabulary.js';

class MemoryDocumentStore implements DocumentStore {
  readonly location = 'memory://keywords.json';
  readonly writes: string[] = [];
  failWrites = false;

  constructor(public body: string | null) {}

  async read(): Promise<string | null> {
    return this.body;
  }

  async write(body: string): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.writes.push(body);
    this.body = body;
  }
}

const seed = {
  CRITICAL: { description: 'Crisis', keywords: { 詐騙: 3 } },
  STRATEGIC: { description: 'Loyalty', keywords: { 失望: 1 } },
  OPERATIONAL: { description: 'Friction', keywords: { 運費: 1, 缺貨: 2 } },
  OPPORTUNITIES: { description: 'Intent', keywords: { 代購: 1 } },
  metadata: { lastUpdated: '2026-01-01 00:00:00', maintainer: 'ops' },
};

const now = () => new Date(2026, 9, 18, 14, 5, 9);

function setup(body: string | null = JSON.stringify(seed)) {
  const documents = new MemoryDocumentStore(body);
  const logger = vi.fn();
  const store = new VocabularyStore({ documents, now, logger, maintainer: 'curator' });
  return { documents, logger, store };
}

function lastWritten(documents: MemoryDocumentStore) {
  const body = documents.writes.at(-1);
  if (body === undefined) {
    throw new Error('nothing was written');
  }
  return JSON.parse(body);
}

describe('VocabularyStore reads', () => {
  test('stats counts terms per tier', async () => {
    const { store } = setup();
    expect(await store.stats()).toEqual({
      perTierCount: { CRITICAL: 1, STRATEGIC: 1, OPERATIONAL: 2, OPPORTUNITY: 1 },
      total: 5,
      lastUpdated: '2026-01-01 00:00:00',
    });
  });

  test('listAll returns the document shape', async () => {
    const { store } = setup();
    expect(await store.listAll()).toEqual(seed);
  });

  test('getTier accepts the tier id or the document key in any case', async () => {
    const { store } = setup();
    const expected = { description: 'Intent', keywords: { 代購: 1 } };
    expect(await store.getTier('opportunities')).toEqual(expected);
    expect(await store.getTier('Opportunity')).toEqual(expected);
    await expect(store.getTier('urgent')).rejects.toThrow(new NotFoundError('Category URGENT not found'));
  });

  test('search returns only tiers with matching terms', async () => {
    const { store } = setup();
    expect(await store.search('缺')).toEqual({ OPERATIONAL: { description: 'Friction', keywords: { 缺貨: 2 } } });
    expect(await store.search('nothing')).toEqual({});
    await expect(store.search('   ')).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  test('load reports a missing document as not found', async () => {
    const { store } = setup(null);
    await expect(store.load()).rejects.toBeInstanceOf(NotFoundError);
  });

  test('a malformed document is unavailable', async () => {
    await expect(setup('{').store.load()).rejects.toBeInstanceOf(ServiceUnavailableError);
    const negative = JSON.stringify({ CRITICAL: { keywords: { 詐騙: -1 } } });
    await expect(setup(negative).store.stats()).rejects.toBeInstanceOf(ServiceUnavailableError);
  });

  test('a missing document reads as an empty vocabulary', async () => {
    const { store } = setup(null);
    expect(await store.stats()).toEqual({
      perTierCount: { CRITICAL: 0, STRATEGIC: 0, OPERATIONAL: 0, OPPORTUNITY: 0 },
      total: 0,
      lastUpdated: 'Unknown',
    });
  });
});

describe('VocabularyStore mutations', () => {
  test('addTerm persists the trimmed term and stamps metadata', async () => {
    const { documents, store } = setup();

    expect(await store.addTerm('operational', ' 退貨 ', 2)).toEqual({ term: '退貨', weight: 2 });

    const written = lastWritten(documents);
    expect(written.OPERATIONAL.keywords).toEqual({ 運費: 1, 缺貨: 2, 退貨: 2 });
    expect(written.metadata).toEqual({ lastUpdated: '2026-10-18 14:05:09', maintainer: 'ops' });
    expect((await store.stats()).lastUpdated).toBe('2026-10-18 14:05:09');
  });

  test('addTerm rejects duplicates, bad weights and unknown tiers without writing', async () => {
    const { documents, store } = setup();

    await expect(store.addTerm('OPERATIONAL', '運費', 1)).rejects.toThrow(
      new ConflictError('Keyword "運費" already exists in OPERATIONAL'),
    );
    await expect(store.addTerm('OPERATIONAL', '退貨', 0)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(store.addTerm('OPERATIONAL', '退貨', Number.NaN)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(store.addTerm('OPERATIONAL', '   ', 1)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(store.addTerm('urgent', '退貨', 1)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(documents.writes).toHaveLength(0);
  });

  test('updateTerm changes an existing weight', async () => {
    const { documents, store } = setup();

    await store.updateTerm('critical', '詐騙', 5);

    expect(lastWritten(documents).CRITICAL.keywords).toEqual({ 詐騙: 5 });
    await expect(store.updateTerm('critical', '假貨', 1)).rejects.toBeInstanceOf(NotFoundError);
  });

  test('deleteTerm removes the term and returns it', async () => {
    const { documents, store } = setup();

    expect(await store.deleteTerm('OPERATIONAL', ' 缺貨 ')).toBe('缺貨');

    expect(lastWritten(documents).OPERATIONAL.keywords).toEqual({ 運費: 1 });
    await expect(store.deleteTerm('OPERATIONAL', '缺貨')).rejects.toBeInstanceOf(NotFoundError);
  });

  test('moveTerm writes removal and insertion together', async () => {
    const { documents, store } = setup();

    const moved = await store.moveTerm('OPERATIONAL', 'critical', '缺貨', 5);

    expect(moved).toEqual({ from: 'OPERATIONAL', to: 'CRITICAL', entry: { term: '缺貨', weight: 5 } });
    expect(documents.writes).toHaveLength(1);
    const written = lastWritten(documents);
    expect(written.OPERATIONAL.keywords).toEqual({ 運費: 1 });
    expect(written.CRITICAL.keywords).toEqual({ 詐騙: 3, 缺貨: 5 });
  });

  test('moveTerm within one tier updates the weight', async () => {
    const { documents, store } = setup();

    await store.moveTerm('OPERATIONAL', 'OPERATIONAL', '缺貨', 4);

    expect(lastWritten(documents).OPERATIONAL.keywords).toEqual({ 運費: 1, 缺貨: 4 });
  });

  test('moveTerm validates both tiers and the term', async () => {
    const { store } = setup();

    await expect(store.moveTerm('OPERATIONAL', 'CRITICAL', '退貨', 1)).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.moveTerm('urgent', 'CRITICAL', '缺貨', 1)).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.moveTerm('OPERATIONAL', 'urgent', '缺貨', 1)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  test('a failed write leaves the term in its original tier', async () => {
    const { documents, logger, store } = setup();
    documents.failWrites = true;

    await expect(store.moveTerm('OPERATIONAL', 'CRITICAL', '缺貨', 5)).rejects.toBeInstanceOf(InternalError);

    const snapshot = await store.snapshot();
    expect(snapshot.tiers.OPERATIONAL.keywords.get('缺貨')).toBe(2);
    expect(snapshot.tiers.CRITICAL.keywords.has('缺貨')).toBe(false);
    expect(documents.body).toBe(JSON.stringify(seed));
    expect(logger).toHaveBeenCalledWith(
      'Failed to persist vocabulary (move OPERATIONAL->CRITICAL:缺貨) to memory://keywords.json: Error: disk full',
    );
  });

  test('earlier snapshots are not changed by later mutations', async () => {
    const { store } = setup();
    const before = await store.snapshot();

    await store.addTerm('CRITICAL', '假貨', 2);

    expect(before.tiers.CRITICAL.keywords.has('假貨')).toBe(false);
    expect((await store.snapshot()).tiers.CRITICAL.keywords.get('假貨')).toBe(2);
  });

  test('keyword order after a mutation matches the order after a reload', async () => {
    const { documents, store } = setup();

    await store.addTerm('CRITICAL', '2024', 1);

    const live = [...(await store.snapshot()).tiers.CRITICAL.keywords.keys()];
    const reloaded = new VocabularyStore({ documents, now });
    expect(live).toEqual(['2024', '詐騙']);
    expect([...(await reloaded.snapshot()).tiers.CRITICAL.keywords.keys()]).toEqual(live);
  });

  test('a __proto__ term is stored as data and survives a reload', async () => {
    const { documents, store } = setup();

    await store.addTerm('OPERATIONAL', '__proto__', 2);

    expect(Object.keys(lastWritten(documents).OPERATIONAL.keywords)).toEqual(['運費', '缺貨', '__proto__']);
    const reloaded = new VocabularyStore({ documents, now });
    expect((await reloaded.snapshot()).tiers.OPERATIONAL.keywords.get('__proto__')).toBe(2);
    expect(await reloaded.search('proto')).toEqual({ OPERATIONAL: { description: 'Friction', keywords: { ['__proto__']: 2 } } });
  });

  test('concurrent mutations are applied one after another', async () => {
    const { documents, store } = setup();

    await Promise.all([store.addTerm('CRITICAL', '假貨', 2), store.addTerm('CRITICAL', '黑心', 1)]);

    expect(documents.writes).toHaveLength(2);
    expect(lastWritten(documents).CRITICAL.keywords).toEqual({ 詐騙: 3, 假貨: 2, 黑心: 1 });
  });

  test('the first write creates the document from an empty vocabulary', async () => {
    const { documents, store } = setup(null);

    await store.addTerm('opportunities', '代購', 1);

    const written = lastWritten(documents);
    expect(written.OPPORTUNITIES).toEqual({ description: TIERS.OPPORTUNITY.defaultDescription, keywords: { 代購: 1 } });
    expect(written.CRITICAL).toEqual({ description: TIERS.CRITICAL.defaultDescription, keywords: {} });
    expect(written.metadata).toEqual({ lastUpdated: '2026-10-18 14:05:09', maintainer: 'curator' });
  });
});

describe('VocabularyStore export', () => {
  test('each committed mutation is exported', async () => {
    const exported: Vocabulary[] = [];
    const exporter: VocabularyExporter = {
      export: async (vocabulary) => {
        exported.push(vocabulary);
      },
    };
    const store = new VocabularyStore({ documents: new MemoryDocumentStore(JSON.stringify(seed)), exporter, now });

    await store.addTerm('CRITICAL', '假貨', 2);

    expect(exported).toHaveLength(1);
    expect(exported[0]?.tiers.CRITICAL.keywords.get('假貨')).toBe(2);
    expect(exported[0]?.metadata.lastUpdated).toBe('2026-10-18 14:05:09');
  });

  test('an export failure is logged and the mutation still succeeds', async () => {
    const documents = new MemoryDocumentStore(JSON.stringify(seed));
    const logger = vi.fn();
    const exporter: VocabularyExporter = {
      export: async () => {
        throw new Error('exporter offline');
      },
    };
    const store = new VocabularyStore({ documents, exporter, now, logger });

    await expect(store.addTerm('CRITICAL', '假貨', 2)).resolves.toEqual({ term: '假貨', weight: 2 });

    expect(documents.writes).toHaveLength(1);
    expect(logger).toHaveBeenCalledWith('Vocabulary updated: add CRITICAL:假貨');
    expect(logger).toHaveBeenCalledWith('Vocabulary export failed: Error: exporter offline');
  });
});
