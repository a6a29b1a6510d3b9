import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { parseVocabularyDocument } from './document.js';
import { FileVocabularyExporter, renderVocabularyModule } from './exporter.js';

const vocabulary = parseVocabularyDocument({
  CRITICAL: { keywords: { 詐騙: 3 } },
  STRATEGIC: { keywords: {} },
  OPERATIONAL: { keywords: { 運費: 1.5 } },
  OPPORTUNITIES: { keywords: { 代購: 1 } },
  metadata: { lastUpdated: '2026-10-01 09:00:00', maintainer: 'ops' },
});

const expectedModule = [
  '/**',
  ' * Keyword configuration for four-level priority classification.',
  ' *',
  ' * Last Updated: 2026-10-01 09:00:00',
  ' * Maintainer: ops',
  ' * Generated from the vocabulary document. Edit the keywords through the admin API instead.',
  ' */',
  '',
  'export const CRITICAL_KEYWORDS: Record<string, number> = {',
  '  "詐騙": 3,',
  '};',
  '',
  'export const STRATEGIC_KEYWORDS: Record<string, number> = {',
  '};',
  '',
  'export const OPERATIONAL_KEYWORDS: Record<string, number> = {',
  '  "運費": 1.5,',
  '};',
  '',
  'export const OPPORTUNITIES_KEYWORDS: Record<string, number> = {',
  '  "代購": 1,',
  '};',
  '',
].join('\n');

describe('renderVocabularyModule', () => {
  test('renders one constant per tier in precedence order', () => {
    expect(renderVocabularyModule(vocabulary)).toBe(expectedModule);
  });

  test('marks missing metadata as unknown', () => {
    const lines = renderVocabularyModule(parseVocabularyDocument({})).split('\n');
    expect(lines[3]).toBe(' * Last Updated: unknown');
    expect(lines[4]).toBe(' * Maintainer: unknown');
  });

  test('metadata cannot close the header comment', () => {
    const lines = renderVocabularyModule(
      parseVocabularyDocument({ metadata: { lastUpdated: '2026 */ export {}', maintainer: 'ops */\nconsole.log(1)' } }),
    ).split('\n');
    expect(lines[3]).toBe(' * Last Updated: 2026 *\\/ export {}');
    expect(lines[4]).toBe(' * Maintainer: ops *\\/ console.log(1)');
    expect(lines[6]).toBe(' */');
  });

  test('quotes terms that are not identifiers', () => {
    const rendered = renderVocabularyModule(parseVocabularyDocument({ OPPORTUNITIES: { keywords: { 'where "to" buy': 2 } } }));
    expect(rendered).toContain('  "where \\"to\\" buy": 2,');
  });
});

describe('FileVocabularyExporter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'review-radar-export-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('writes the rendered module to its destination', async () => {
    const destination = path.join(dir, 'generated', 'keywords.ts');

    await new FileVocabularyExporter(destination).export(vocabulary);

    expect(await fs.readFile(destination, 'utf8')).toBe(expectedModule);
  });
});
