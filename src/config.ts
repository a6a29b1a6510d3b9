import {
  DEFAULT_COLLECTION_DEADLINE_MS,
  DEFAULT_COLLECTOR_CONCURRENCY,
  DEFAULT_COLLECTOR_TIMEOUT_MS,
} from './collectors/collect.js';

export interface AppConfig {
  port: number;
  keywordsPath: string;
  keywordsExportPath: string | undefined;
  maintainer: string;
  serpApiKey: string | undefined;
  collectorTimeoutMs: number;
  collectionDeadlineMs: number;
  collectorConcurrency: number;
  cacheDir: string;
  cacheMaxAgeMs: number;
}

export type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment = process.env): AppConfig {
  return {
    port: parsePositiveInteger(env.REVIEW_RADAR_PORT, 8000, 'REVIEW_RADAR_PORT'),
    keywordsPath: nonEmpty(env.KEYWORDS_PATH) ?? 'data/keywords.json',
    keywordsExportPath: nonEmpty(env.KEYWORDS_EXPORT_PATH),
    maintainer: nonEmpty(env.KEYWORDS_MAINTAINER) ?? 'unknown',
    serpApiKey: nonEmpty(env.SERPAPI_API_KEY),
    collectorTimeoutMs: parsePositiveInteger(env.COLLECTOR_TIMEOUT_MS, DEFAULT_COLLECTOR_TIMEOUT_MS, 'COLLECTOR_TIMEOUT_MS'),
    collectionDeadlineMs: parsePositiveInteger(
      env.COLLECTION_DEADLINE_MS,
      DEFAULT_COLLECTION_DEADLINE_MS,
      'COLLECTION_DEADLINE_MS',
    ),
    collectorConcurrency: parsePositiveInteger(
      env.COLLECTOR_CONCURRENCY,
      DEFAULT_COLLECTOR_CONCURRENCY,
      'COLLECTOR_CONCURRENCY',
    ),
    cacheDir: nonEmpty(env.CACHE_DIR) ?? '.cache',
    cacheMaxAgeMs: parseNonNegativeInteger(env.CACHE_MAX_AGE_MS, 15 * 60 * 1000, 'CACHE_MAX_AGE_MS'),
  };
}

export function parsePositiveInteger(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number.`);
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be zero or a positive number.`);
  }
  return parsed;
}

export function parseCommaList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const seen = new Set<string>();
  const parts: string[] = [];
  for (const rawPart of value.split(',')) {
    const trimmed = rawPart.trim();
    if (!trimmed) {
      continue;
    }
    const key = trimmed.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    parts.push(key);
  }
  return parts;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
