import { promises as fs } from 'node:fs';
import path from 'node:path';
import { orderedTiers, type Vocabulary } from './vocabulary.js';
import { TIERS } from './tiers.js';

export interface VocabularyExporter {
  export(vocabulary: Vocabulary): Promise<void>;
}

/**
 * Renders the vocabulary as a TypeScript module, one `<KEY>_KEYWORDS` constant per tier.
 * The JSON document stays authoritative; this is a mirror for code that wants the terms
 * compiled in.
 */
export function renderVocabularyModule(vocabulary: Vocabulary): string {
  const lines = [
    '/**',
    ' * Keyword configuration for four-level priority classification.',
    ' *',
    ` * Last Updated: ${commentSafe(vocabulary.metadata.lastUpdated || 'unknown')}`,
    ` * Maintainer: ${commentSafe(vocabulary.metadata.maintainer || 'unknown')}`,
    ' * Generated from the vocabulary document. Edit the keywords through the admin API instead.',
    ' */',
    '',
  ];

  for (const tier of orderedTiers(vocabulary)) {
    lines.push(`export const ${TIERS[tier.id].documentKey}_KEYWORDS: Record<string, number> = {`);
    for (const [term, weight] of tier.keywords) {
      lines.push(`  ${JSON.stringify(term)}: ${weight},`);
    }
    lines.push('};', '');
  }

  return lines.join('\n');
}

function commentSafe(value: string): string {
  return value.replace(/\*\//g, '*\\/').replace(/\r?\n/g, ' ');
}

export class FileVocabularyExporter implements VocabularyExporter {
  constructor(private readonly destination: string) {}

  async export(vocabulary: Vocabulary): Promise<void> {
    await fs.mkdir(path.dirname(this.destination), { recursive: true });
    await fs.writeFile(this.destination, renderVocabularyModule(vocabulary), 'utf8');
  }
}
