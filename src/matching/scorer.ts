/**
 * Scanline — Quality Scorer
 *
 * Additive point system, then multiplied by the topic weight:
 * - engagement floor gate (drop, not penalize)
 * - long-form bonus
 * - priority account bonus
 * - lab account bonus
 *
 * Pure: the result depends only on the item and the static config.
 */

import type { ContentItem, ContentSource, QualityFilters, ScoredItem } from '../types';
import { hostMatches, hostOf } from '../lib/fingerprint';

export type ScoreOutcome =
  | { kept: true; item: ScoredItem }
  | { kept: false; reason: 'engagement-floor'; metric: string; value: number; floor: number };

export type FloorCheck =
  | { passed: true }
  | { passed: false; metric: string; value: number; floor: number };

/** Engagement metric gated per source */
const FLOOR_METRIC: Record<ContentSource, string | null> = {
  reddit: 'score',
  x: 'likes',
  web: null,
};

function floorFor(source: ContentSource, filters: QualityFilters): number {
  switch (source) {
    case 'reddit':
      return filters.minEngagement.redditScore;
    case 'x':
      return filters.minEngagement.xLikes;
    case 'web':
      return 0;
  }
}

/**
 * Long body, or a link to a known long-form host.
 */
export function isLongForm(item: ContentItem, filters: QualityFilters): boolean {
  if (item.bodyLength >= filters.longFormMinChars) return true;

  const host = hostOf(item.url);
  return host !== null && filters.articleDomains.some(domain => hostMatches(host, domain));
}

export class QualityScorer {
  constructor(private readonly filters: QualityFilters) {}

  /**
   * Priority and lab accounts always pass. A metric the source did not
   * report passes too: missing data is not low engagement.
   */
  checkEngagementFloor(item: ContentItem): FloorCheck {
    if (item.isPriorityAccount || item.isLabAccount) return { passed: true };

    const metric = FLOOR_METRIC[item.source];
    const floor = floorFor(item.source, this.filters);
    if (metric === null || floor <= 0) return { passed: true };

    const value = item.engagement[metric];
    if (value === undefined || value >= floor) return { passed: true };

    return { passed: false, metric, value, floor };
  }

  score(item: ContentItem, topicWeight: number): number {
    let points = 0;

    if (isLongForm(item, this.filters)) {
      points += this.filters.longFormBonus;
    }
    if (item.isPriorityAccount) {
      points += this.filters.priorityAccountBonus;
    }
    if (item.isLabAccount) {
      points += this.filters.labAccountBonus;
    }

    return points * topicWeight;
  }

  /**
   * Gate, then score. Items below the floor never get a score.
   */
  evaluate(item: ContentItem, topicWeight: number): ScoreOutcome {
    const check = this.checkEngagementFloor(item);
    if (!check.passed) {
      return {
        kept: false,
        reason: 'engagement-floor',
        metric: check.metric,
        value: check.value,
        floor: check.floor,
      };
    }

    return {
      kept: true,
      item: Object.freeze({ ...item, score: this.score(item, topicWeight) }),
    };
  }
}
