import type { ReviewItem } from '../types/index.js';

export const MANUAL_SOURCE_ID = 'manual';

/** Splits newline-delimited text into one review per non-blank line. */
export function parseRawText(raw: string): ReviewItem[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((text) => ({ text, sourceId: MANUAL_SOURCE_ID, url: '', author: 'anonymous' }));
}
