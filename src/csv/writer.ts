import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';

export interface CsvRow {
  brand: string;
  priority: number;
  category: string;
  sentiment: string;
  sentiment_score: number;
  sentiment_confidence: number;
  source: string;
  posted_at: string;
  title: string;
  content: string;
  keywords: string;
  url: string;
}

const HEADER: ReadonlyArray<keyof CsvRow> = [
  'brand',
  'priority',
  'category',
  'sentiment',
  'sentiment_score',
  'sentiment_confidence',
  'source',
  'posted_at',
  'title',
  'content',
  'keywords',
  'url',
];

export class CsvStreamWriter {
  private constructor(private readonly destination: string, private readonly stream: WriteStream) {}

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${formatCsvHeader()}\n`);
    return new CsvStreamWriter(destination, stream);
  }

  async writeRow(row: CsvRow): Promise<void> {
    if (!this.stream.write(`${formatCsvLine(row)}\n`)) {
      await onceDrain(this.stream);
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }
}

export function formatCsvHeader(): string {
  return HEADER.join(',');
}

export function formatCsvLine(row: CsvRow): string {
  return HEADER.map((key) => csvEscape(String(row[key]))).join(',');
}

async function onceDrain(stream: WriteStream): Promise<void> {
  await new Promise<void>((resolve) => stream.once('drain', resolve));
}

function csvEscape(value: string): string {
  const sanitized = value.replace(/\r?\n/g, ' ');
  const needsQuotes = sanitized.includes(',') || sanitized.includes('"');
  const escaped = sanitized.replace(/"/g, '""');
  return needsQuotes ? `"${escaped}"` : escaped;
}
