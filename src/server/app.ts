import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger as requestLogger } from 'hono/logger';
import { validator } from 'hono/validator';
import type { BrandAnalyzer } from '../analysis/brandAnalyzer.js';
import { InternalError, ReviewRadarError, describeError } from '../errors.js';
import { jot } from '../jot.js';
import type { Logger } from '../logging.js';
import type { VocabularyStore } from '../vocabulary/store.js';
import { parseBody } from './body.js';
import { createKeywordRoutes } from './keywords.js';

const analyzeBodyNode = jot.object({
  brand_name: jot.string({ trim: true, minLength: 1 }),
  text: jot.optional(jot.string()),
});

export interface AppDependencies {
  store: VocabularyStore;
  analyzer: BrandAnalyzer;
  logger?: Logger;
}

export function createApp({ store, analyzer, logger }: AppDependencies): Hono {
  const app = new Hono();

  if (logger) {
    app.use('*', requestLogger((message, ...rest) => logger([message, ...rest].join(' '))));
  }

  app.get('/', (c) => c.json({ message: 'review-radar API', status: 'running' }));
  app.get('/health', (c) => c.json({ status: 'healthy' }));

  app.post(
    '/api/analyze',
    validator('json', (value) => parseBody(analyzeBodyNode, value)),
    async (c) => {
      const body = c.req.valid('json');
      const { payload } = await analyzer.analyze({ brandName: body.brand_name, text: body.text });
      return c.json(payload);
    },
  );

  app.route('/api/keywords', createKeywordRoutes(store));

  app.onError((err, c) => {
    if (err instanceof ReviewRadarError && !(err instanceof InternalError)) {
      return c.json({ error: err.message }, err.status);
    }
    if (err instanceof HTTPException) {
      return c.json({ error: err.message || 'Bad request' }, err.status);
    }
    logger?.(`${c.req.method} ${c.req.path} failed: ${describeError(err)}${err.stack ? `\n${err.stack}` : ''}`);
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}
