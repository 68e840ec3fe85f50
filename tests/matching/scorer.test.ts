/**
 * Tests for the quality scorer and classifier
 */

import { describe, it, expect } from 'vitest';
import { QualityScorer, isLongForm } from '../../src/matching/scorer';
import { Classifier, classifyItem } from '../../src/matching/classifier';
import { makeConfig, makeItem } from '../helpers/fixtures';

const config = makeConfig(input => {
  input.qualityFilters = {
    minEngagement: { redditScore: 10, xLikes: 20 },
    longFormMinChars: 400,
    longFormBonus: 2,
    priorityAccountBonus: 3,
    labAccountBonus: 2,
    articleDomains: ['arxiv.org', 'substack.com'],
  };
});
const filters = config.qualityFilters;
const scorer = new QualityScorer(filters);

describe('QualityScorer.checkEngagementFloor', () => {
  it('passes when the metric is missing', () => {
    expect(scorer.checkEngagementFloor(makeItem({ engagement: {} }))).toEqual({ passed: true });
  });

  it('fails below the floor and passes at it', () => {
    expect(scorer.checkEngagementFloor(makeItem({ engagement: { score: 9 } }))).toEqual({
      passed: false,
      metric: 'score',
      value: 9,
      floor: 10,
    });
    expect(scorer.checkEngagementFloor(makeItem({ engagement: { score: 10 } })).passed).toBe(true);
  });

  it('gates x on likes and never gates web', () => {
    expect(scorer.checkEngagementFloor(makeItem({ source: 'x', engagement: { likes: 3 } })).passed).toBe(false);
    expect(scorer.checkEngagementFloor(makeItem({ source: 'web', engagement: { points: 0 } })).passed).toBe(true);
  });

  it('passes unknown likes and drops five likes against a floor of 100', () => {
    const strict = new QualityScorer(
      makeConfig(input => {
        input.qualityFilters = { minEngagement: { xLikes: 100 } };
      }).qualityFilters
    );
    expect(strict.evaluate(makeItem({ source: 'x', engagement: {} }), 1).kept).toBe(true);
    expect(strict.evaluate(makeItem({ source: 'x', engagement: { likes: 5 } }), 1).kept).toBe(false);
  });

  it('lets priority and lab accounts through', () => {
    const low = { source: 'x' as const, engagement: { likes: 0 } };
    expect(scorer.checkEngagementFloor(makeItem({ ...low, isPriorityAccount: true })).passed).toBe(true);
    expect(scorer.checkEngagementFloor(makeItem({ ...low, isLabAccount: true })).passed).toBe(true);
  });
});

describe('QualityScorer.score', () => {
  it('adds the bonuses and applies the topic weight', () => {
    const item = makeItem({ bodyLength: 1200, isPriorityAccount: true, isLabAccount: true });
    expect(scorer.score(item, 1)).toBe(7);
    expect(scorer.score(item, 1.2)).toBe(8.4);
  });

  it('keeps the weighted score unrounded', () => {
    const item = makeItem({ bodyLength: 1200 });
    expect(scorer.score(item, 1.001)).toBeCloseTo(2.002, 10);
    expect(scorer.score(item, 1.001)).toBeLessThan(scorer.score(item, 1.004));
  });

  it('scores a plain item as zero', () => {
    expect(scorer.score(makeItem(), 1.5)).toBe(0);
  });

  it('counts article domains as long-form', () => {
    expect(scorer.score(makeItem({ url: 'https://arxiv.org/abs/2401.00001' }), 0.9)).toBe(1.8);
  });
});

describe('QualityScorer.evaluate', () => {
  it('drops without scoring below the floor', () => {
    expect(scorer.evaluate(makeItem({ engagement: { score: 1 } }), 1)).toEqual({
      kept: false,
      reason: 'engagement-floor',
      metric: 'score',
      value: 1,
      floor: 10,
    });
  });

  it('returns a frozen scored copy', () => {
    const outcome = scorer.evaluate(makeItem({ bodyLength: 400 }), 1);
    if (!outcome.kept) throw new Error('expected the item to be kept');
    expect(outcome.item.score).toBe(2);
    expect(Object.isFrozen(outcome.item)).toBe(true);
  });
});

describe('isLongForm', () => {
  it('matches subdomains of article hosts', () => {
    expect(isLongForm(makeItem({ url: 'https://someone.substack.com/p/post' }), filters)).toBe(true);
    expect(isLongForm(makeItem({ url: 'https://notsubstack.com/p/post' }), filters)).toBe(false);
  });
});

describe('classifyItem', () => {
  it('puts lab posts first, then long-form, then everything else', () => {
    expect(classifyItem(makeItem({ isLabAccount: true, bodyLength: 2000 }), filters)).toBe('lab-pulse');
    expect(classifyItem(makeItem({ bodyLength: 2000 }), filters)).toBe('deep-dive');
    expect(classifyItem(makeItem(), filters)).toBe('general');
  });

  it('decorates a scored item with its category', () => {
    const classifier = new Classifier(filters);
    const item = classifier.decorate({ ...makeItem({ url: 'https://arxiv.org/abs/1' }), score: 2 });
    expect(item.category).toBe('deep-dive');
    expect(item.score).toBe(2);
  });
});
