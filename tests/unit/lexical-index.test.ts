import { describe, it, expect } from 'vitest';

import { LexicalIndex } from '../../src/enrichment/index.js';

describe('LexicalIndex', () => {
  const index = new LexicalIndex([
    { text: 'Wireless headphones with noise cancellation', metadata: { id: 'a', category: 'Electronics' } },
    { text: 'Braided charging cable', metadata: { id: 'b', category: 'Accessories' } },
    { text: 'Wireless charging pad', metadata: { id: 'c', category: 'Accessories' } }
  ]);

  it('ranks by the share of query terms matched', async () => {
    const hits = await index.search('wireless charging', 5);

    expect(hits.map(hit => [hit.source.id, hit.score])).toEqual([
      ['c', 1],
      ['a', 0.5],
      ['b', 0.5]
    ]);
  });

  it('applies metadata filters and the limit', async () => {
    const hits = await index.search('wireless charging', 1, { category: 'accessories' });

    expect(hits).toEqual([
      { text: 'Wireless charging pad', score: 1, source: { id: 'c', category: 'Accessories' } }
    ]);
  });

  it('drops weak matches and stopword-only queries', async () => {
    expect(await index.search('wireless speakers for the garden party', 5)).toEqual([]);
    expect(await index.search('the and of', 5)).toEqual([]);
  });
});
