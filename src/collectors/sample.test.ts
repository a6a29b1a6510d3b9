import { describe, expect, test } from 'vitest';
import { SampleCollector } from './sample.js';

const now = Date.parse('2026-10-18T12:00:00.000Z');

describe('SampleCollector', () => {
  test('returns bundled reviews for a known brand', async () => {
    const collector = new SampleCollector({ now: () => now });

    const items = await collector.collect(' Nimbus Audio ');

    expect(items).toEqual([
      {
        text: 'Nimbus earbuds where to buy in Taipei?\nLooking for the Nimbus Audio earbuds, anyone know where to buy them locally?',
        title: 'Nimbus earbuds where to buy in Taipei?',
        sourceId: 'threads',
        url: 'https://sample.invalid/review/Nimbus%20Audio/0',
        author: 'audio_hunter',
        postedAt: new Date('2026-10-18T12:00:00.000Z'),
      },
      {
        text: 'Nimbus app checkout keeps failing\nTried three times, the checkout page on the Nimbus Audio app just spins.',
        title: 'Nimbus app checkout keeps failing',
        sourceId: 'dcard',
        url: 'https://sample.invalid/review/Nimbus%20Audio/1',
        author: 'spinning_wheel',
        postedAt: new Date('2026-10-16T12:00:00.000Z'),
      },
    ]);
  });

  test('returns nothing for an unknown brand', async () => {
    expect(await new SampleCollector().collect('Unknown Brand')).toEqual([]);
  });
});
