import path from 'node:path';
import { ReviewAggregator } from './aggregation/aggregator.js';
import { BrandAnalyzer } from './analysis/brandAnalyzer.js';
import { FileCache } from './cache/fileCache.js';
import { createCollectors, defaultCollectorNames } from './collectors/registry.js';
import type { AppConfig } from './config.js';
import { createLogger } from './logging.js';
import { FileDocumentStore } from './vocabulary/documentStore.js';
import { FileVocabularyExporter } from './vocabulary/exporter.js';
import { VocabularyStore } from './vocabulary/store.js';

export interface Services {
  store: VocabularyStore;
  aggregator: ReviewAggregator;
  analyzer: BrandAnalyzer;
}

export function createVocabularyStore(config: AppConfig): VocabularyStore {
  return new VocabularyStore({
    documents: new FileDocumentStore(path.resolve(config.keywordsPath)),
    exporter: config.keywordsExportPath
      ? new FileVocabularyExporter(path.resolve(config.keywordsExportPath))
      : undefined,
    maintainer: config.maintainer,
    logger: createLogger('vocabulary'),
  });
}

export function createServices(config: AppConfig, collectorNames?: readonly string[]): Services {
  const store = createVocabularyStore(config);
  const aggregator = new ReviewAggregator(store, createLogger('aggregate'));
  const names = collectorNames && collectorNames.length > 0 ? collectorNames : defaultCollectorNames(config);
  const collectors = createCollectors(names, config, new FileCache({ baseDir: config.cacheDir }));
  const analyzer = new BrandAnalyzer(aggregator, {
    collectors,
    collect: {
      concurrency: config.collectorConcurrency,
      timeoutMs: config.collectorTimeoutMs,
      deadlineMs: config.collectionDeadlineMs,
    },
    logger: createLogger('collect'),
  });
  return { store, aggregator, analyzer };
}
