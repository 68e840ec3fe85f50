/**
 * Tests for ranking and digest grouping
 */

import { describe, it, expect } from 'vitest';
import { buildDigest, rankItems } from '../../src/matching/ranker';
import { makeClassified, makeConfig } from '../helpers/fixtures';

describe('rankItems', () => {
  it('orders by score, then recency, dated before undated, then input order', () => {
    const items = [
      makeClassified({ url: 'https://example.com/undated-1', score: 2 }),
      makeClassified({ url: 'https://example.com/old', score: 2, publishedAt: '2026-01-01T00:00:00Z' }),
      makeClassified({ url: 'https://example.com/top', score: 5 }),
      makeClassified({ url: 'https://example.com/new', score: 2, publishedAt: '2026-01-03T00:00:00Z' }),
      makeClassified({ url: 'https://example.com/undated-2', score: 2 }),
      makeClassified({ url: 'https://example.com/bad-date', score: 2, publishedAt: 'yesterday' }),
    ];

    expect(rankItems(items).map(i => i.url)).toEqual([
      'https://example.com/top',
      'https://example.com/new',
      'https://example.com/old',
      'https://example.com/undated-1',
      'https://example.com/undated-2',
      'https://example.com/bad-date',
    ]);
  });

  it('does not modify its input', () => {
    const items = [makeClassified({ score: 1 }), makeClassified({ score: 3 })];
    rankItems(items);
    expect(items.map(i => i.score)).toEqual([1, 3]);
  });
});

describe('buildDigest', () => {
  const config = makeConfig();

  it('caps the reading list and groups what survives', () => {
    const topicItems = [
      makeClassified({ url: 'https://example.com/a', score: 4, topicSlug: 'agents', category: 'deep-dive' }),
      makeClassified({ url: 'https://example.com/b', score: 3, topicSlug: 'rag', category: 'general' }),
      makeClassified({ url: 'https://example.com/c', score: 1, topicSlug: 'rag', category: 'lab-pulse' }),
    ];
    const mustFollow = [
      makeClassified({ url: 'https://x.com/a/status/1', score: 1, topicSlug: '' }),
      makeClassified({ url: 'https://x.com/a/status/2', score: 3, topicSlug: '' }),
    ];

    const digest = buildDigest(topicItems, mustFollow, config.topics, 2);

    expect(digest.readingList.map(i => i.url)).toEqual(['https://example.com/a', 'https://example.com/b']);
    expect(digest.byCategory['deep-dive'].map(i => i.url)).toEqual(['https://example.com/a']);
    expect(digest.byCategory.general.map(i => i.url)).toEqual(['https://example.com/b']);
    expect(digest.byCategory['lab-pulse']).toEqual([]);
    expect(digest.byTopic.map(g => [g.slug, g.displayName, g.items.length])).toEqual([
      ['agents', 'Agent Development', 1],
      ['rag', 'RAG & AI Search', 1],
    ]);
    expect(digest.mustFollow.map(i => i.url)).toEqual(['https://x.com/a/status/2', 'https://x.com/a/status/1']);
  });
});
