/**
 * Tests for the daily note writer
 */

import { describe, it, expect } from 'vitest';
import {
  dailyNotePath,
  formatDisplayDate,
  itemLine,
  linkText,
  noteHeadings,
  renderDailyNote,
} from '../../src/delivery/daily-note';
import { buildDigest } from '../../src/matching/ranker';
import { makeClassified, makeConfig } from '../helpers/fixtures';

const config = makeConfig(input => {
  input.mustFollow = [{ handle: 'AnthropicAI', group: 'Labs' }];
});

const paper = makeClassified({
  source: 'web',
  url: 'https://arxiv.org/abs/1',
  title: 'Long [paper] on agents',
  topicSlug: 'agents',
  category: 'deep-dive',
  score: 3,
});
const thread = makeClassified({
  source: 'reddit',
  url: 'https://www.reddit.com/r/LocalLLaMA/comments/1/',
  title: 'RAG tips',
  community: 'LocalLLaMA',
  topicSlug: 'rag',
  category: 'general',
  score: 1,
});
const labPost = makeClassified({
  source: 'x',
  url: 'https://x.com/AnthropicAI/status/9',
  title: 'We are releasing',
  excerpt: 'We are releasing a new model today.',
  author: 'AnthropicAI',
  engagement: { likes: 500 },
  topicSlug: '',
  isLabAccount: true,
  isPriorityAccount: true,
  category: 'lab-pulse',
  score: 5,
});

const digest = buildDigest([paper, thread], [labPost], config.topics, 15);

describe('renderDailyNote', () => {
  it('renders every section in order', () => {
    const note = renderDailyNote({
      date: '2026-01-05',
      digest,
      synthesis: {
        briefing: 'Big day.',
        labPulseSummary: '',
        topics: [
          { slug: 'agents', headline: 'Agents headline', keyPoints: ['Point one'] },
          { slug: 'rag', headline: '', keyPoints: [] },
        ],
      },
      config,
      feedback: { good: 1, bad: 0, lifetime: { totalGood: 4, totalBad: 2 } },
    });

    expect(note).toBe(
      [
        '---',
        'date: 2026-01-05',
        'type: daily-research',
        'topics: [agents, rag]',
        'status: unread',
        'reading_list: 2',
        'must_follow: 1',
        'deep_dives: 1',
        'lab_pulse: 0',
        '---',
        '',
        '# Daily Research — Jan 05, 2026',
        '',
        "## Today's Briefing",
        '',
        'Big day.',
        '',
        '## Must Follow',
        '',
        '### Labs',
        '',
        '- [ ] [We are releasing a new model today.](https://x.com/AnthropicAI/status/9) — @AnthropicAI (500 likes)',
        '',
        '## Deep Dives',
        '',
        '- [ ] [Long (paper) on agents](https://arxiv.org/abs/1) — arxiv.org #agents',
        '',
        '## Reading List',
        '',
        '- [ ] [RAG tips](https://www.reddit.com/r/LocalLLaMA/comments/1/) — r/LocalLLaMA #rag',
        '',
        '---',
        '',
        '## Agent Development',
        '',
        '**Agents headline**',
        '',
        '- Point one',
        '',
        '*1 new item*',
        '',
        '---',
        '',
        '## RAG & AI Search',
        '',
        '*1 new item*',
        '',
        '---',
        '',
        '## Promote to Library',
        '',
        '> Add `#keep` to any item above to promote it to',
        '> `Research/Library/` on the next run.',
        '',
        '## Rate Results',
        '',
        '> Tag any item with `#good` or `#bad` to give feedback.',
        '',
        '> Feedback processed this run: +1 good, -0 bad (lifetime: 4 good, 2 bad)',
        '',
      ].join('\n')
    );
  });

  it('shows the lab summary above lab items', () => {
    const labTopicItem = makeClassified({
      source: 'x',
      url: 'https://x.com/OpenAI/status/3',
      title: 'Model update',
      author: 'OpenAI',
      topicSlug: 'agents',
      category: 'lab-pulse',
    });
    const note = renderDailyNote({
      date: '2026-01-05',
      digest: buildDigest([labTopicItem], [], config.topics, 15),
      synthesis: { briefing: '', labPulseSummary: 'Labs were busy.', topics: [] },
      config,
    });

    expect(note).toContain(
      '## Lab Pulse\n\nLabs were busy.\n\n- [ ] [Model update](https://x.com/OpenAI/status/3) — @OpenAI #agents\n'
    );
    expect(note).not.toContain("## Today's Briefing");
    expect(note).not.toContain('## Must Follow');
  });
});

describe('itemLine', () => {
  it('labels web items by host and flattens link text', () => {
    expect(linkText('a  [b]\nc')).toBe('a (b) c');
    expect(itemLine(makeClassified({ source: 'web', url: 'https://news.example.com/x', topicSlug: 'rag' }))).toBe(
      '- [ ] [A reasonably long example title](https://news.example.com/x) — news.example.com #rag'
    );
  });
});

describe('noteHeadings', () => {
  it('lists the fixed sections, topic names and account groups once each', () => {
    expect(noteHeadings(config)).toEqual([
      "Today's Briefing",
      'Must Follow',
      'Lab Pulse',
      'Deep Dives',
      'Reading List',
      'Promote to Library',
      'Rate Results',
      'Agent Development',
      'RAG & AI Search',
      'Labs',
      'Other',
    ]);
  });
});

describe('dailyNotePath', () => {
  it('files notes by year and month and never reuses a path', async () => {
    const taken = new Set(['Research/Dailies/2026/01/2026-01-05.md']);
    expect(await dailyNotePath('Research/Dailies', '2026-01-06', async p => taken.has(p))).toBe(
      'Research/Dailies/2026/01/2026-01-06.md'
    );
    expect(await dailyNotePath('Research/Dailies', '2026-01-05', async p => taken.has(p))).toBe(
      'Research/Dailies/2026/01/2026-01-05-2.md'
    );
  });
});

describe('formatDisplayDate', () => {
  it('returns the input when it is not a date', () => {
    expect(formatDisplayDate('2026-03-14')).toBe('Mar 14, 2026');
    expect(formatDisplayDate('someday')).toBe('someday');
  });
});
