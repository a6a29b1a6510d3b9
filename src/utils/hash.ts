import { createHash } from 'node:crypto';

// Key order and undefined fields must not change the checksum of an otherwise equal value.
function canonicalize(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const serialized = entries.map(([key, val]) => `${JSON.stringify(key)}:${canonicalize(val)}`).join(',');
  return `{${serialized}}`;
}

export function checksumFrom(value: unknown): string {
  return createHash('sha256').update(canonicalize(value)).digest('hex');
}
