/**
 * Tests for record normalization
 */

import { describe, it, expect } from 'vitest';
import { AccountDirectory, normalizeRecord, normalizeRecords } from '../../src/feeds/normalizer';
import { makeConfig, makeRecord } from '../helpers/fixtures';

const config = makeConfig(input => {
  input.qualityFilters = {
    priorityAccounts: { x: ['@Simon'], redditSubreddits: ['r/LocalLLaMA'] },
    labAccounts: { Anthropic: ['AnthropicAI', 'alexalbert__'] },
  };
});
const filters = config.qualityFilters;

describe('normalizeRecord', () => {
  it('builds an item with defaults and collapsed title whitespace', () => {
    const item = normalizeRecord(
      makeRecord({ title: '  Tool   use\nin agents ', engagement: { score: 12 } }),
      { source: 'reddit', topicSlug: 'agents', filters }
    );

    expect(item).toEqual({
      source: 'reddit',
      url: 'https://example.com/post',
      title: 'Tool use in agents',
      author: undefined,
      publishedAt: undefined,
      engagement: { score: 12 },
      bodyLength: 0,
      excerpt: undefined,
      community: undefined,
      topicSlug: 'agents',
      isPriorityAccount: false,
      isLabAccount: false,
    });
    expect(Object.isFrozen(item)).toBe(true);
  });

  it('drops records without a title or an http URL', () => {
    const ctx = { source: 'web' as const, topicSlug: 'agents', filters };
    expect(normalizeRecord(makeRecord({ title: '   ' }), ctx)).toBeNull();
    expect(normalizeRecord(makeRecord({ url: 'ftp://example.com/file' }), ctx)).toBeNull();
    expect(normalizeRecord(makeRecord({ url: 'not a url' }), ctx)).toBeNull();
  });

  it('stamps priority and lab flags case-insensitively', () => {
    const x = normalizeRecord(makeRecord({ author: 'anthropicai' }), { source: 'x', topicSlug: 'agents', filters });
    expect(x?.isLabAccount).toBe(true);
    expect(x?.isPriorityAccount).toBe(false);

    const simon = normalizeRecord(makeRecord({ author: 'simon' }), { source: 'x', topicSlug: 'agents', filters });
    expect(simon?.isPriorityAccount).toBe(true);

    const reddit = normalizeRecord(makeRecord({ community: 'localllama' }), {
      source: 'reddit',
      topicSlug: 'agents',
      filters,
    });
    expect(reddit?.isPriorityAccount).toBe(true);
    expect(reddit?.isLabAccount).toBe(false);
  });

  it('forces the priority flag for the must-follow track', () => {
    const item = normalizeRecord(makeRecord({ author: 'someone' }), {
      source: 'x',
      topicSlug: '',
      filters,
      forcePriority: true,
    });
    expect(item?.isPriorityAccount).toBe(true);
    expect(item?.topicSlug).toBe('');
  });
});

describe('normalizeRecords', () => {
  it('keeps usable records in order', () => {
    const items = normalizeRecords(
      [makeRecord({ title: 'First' }), makeRecord({ title: '' }), makeRecord({ title: 'Second' })],
      { source: 'web', topicSlug: 'rag', filters }
    );
    expect(items.map(i => i.title)).toEqual(['First', 'Second']);
  });
});

describe('AccountDirectory', () => {
  it('only treats x authors as lab accounts', () => {
    const accounts = new AccountDirectory(filters);
    expect(accounts.isLab('reddit', makeRecord({ author: 'AnthropicAI' }))).toBe(false);
    expect(accounts.isLab('x', makeRecord({ author: 'ALEXALBERT__' }))).toBe(true);
  });
});
