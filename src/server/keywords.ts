import { Hono } from 'hono';
import { validator } from 'hono/validator';
import { jot } from '../jot.js';
import { TIERS, documentKeyOf } from '../vocabulary/tiers.js';
import type { VocabularyStore } from '../vocabulary/store.js';
import { parseBody } from './body.js';

const requiredText = () => jot.string({ trim: true, minLength: 1 });

const keywordBodyNode = jot.object({
  category: requiredText(),
  word: requiredText(),
  weight: jot.withDefault(jot.number({ coerce: true }), 1),
});

const deleteBodyNode = jot.object({
  category: requiredText(),
  word: requiredText(),
});

const moveBodyNode = jot.object({
  from_category: requiredText(),
  to_category: requiredText(),
  word: requiredText(),
  weight: jot.withDefault(jot.number({ coerce: true }), 1),
});

/** Vocabulary administration endpoints, mounted under `/api/keywords`. */
export function createKeywordRoutes(store: VocabularyStore): Hono {
  const routes = new Hono();

  routes.get('/all', async (c) => c.json(await store.listAll()));

  routes.get('/category/:category', async (c) => c.json(await store.getTier(c.req.param('category'))));

  routes.get('/search', async (c) => c.json(await store.search(c.req.query('q') ?? '')));

  routes.get('/stats', async (c) => {
    const stats = await store.stats();
    return c.json({
      CRITICAL: stats.perTierCount.CRITICAL,
      STRATEGIC: stats.perTierCount.STRATEGIC,
      OPERATIONAL: stats.perTierCount.OPERATIONAL,
      OPPORTUNITIES: stats.perTierCount.OPPORTUNITY,
      TOTAL: stats.total,
      lastUpdated: stats.lastUpdated,
    });
  });

  routes.post(
    '/add',
    validator('json', (value) => parseBody(keywordBodyNode, value)),
    async (c) => {
      const body = c.req.valid('json');
      const entry = await store.addTerm(body.category, body.word, body.weight);
      return c.json(
        { message: 'Keyword added successfully', category: documentKeyOf(body.category), word: entry.term, weight: entry.weight },
        201,
      );
    },
  );

  routes.post(
    '/update',
    validator('json', (value) => parseBody(keywordBodyNode, value)),
    async (c) => {
      const body = c.req.valid('json');
      const entry = await store.updateTerm(body.category, body.word, body.weight);
      return c.json({
        message: 'Keyword updated successfully',
        category: documentKeyOf(body.category),
        word: entry.term,
        weight: entry.weight,
      });
    },
  );

  routes.post(
    '/delete',
    validator('json', (value) => parseBody(deleteBodyNode, value)),
    async (c) => {
      const body = c.req.valid('json');
      const word = await store.deleteTerm(body.category, body.word);
      return c.json({ message: 'Keyword deleted successfully', category: documentKeyOf(body.category), word });
    },
  );

  routes.post(
    '/move',
    validator('json', (value) => parseBody(moveBodyNode, value)),
    async (c) => {
      const body = c.req.valid('json');
      const moved = await store.moveTerm(body.from_category, body.to_category, body.word, body.weight);
      const from = TIERS[moved.from].documentKey;
      const to = TIERS[moved.to].documentKey;
      return c.json({ message: `Keyword moved from ${from} to ${to}`, word: moved.entry.term, weight: moved.entry.weight });
    },
  );

  return routes;
}
