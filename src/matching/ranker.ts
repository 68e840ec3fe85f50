/**
 * Scanline — Ranker
 *
 * Orders the surviving items, caps the reading list and groups the
 * result the way the synthesis and writer collaborators consume it.
 */

import type { ClassifiedItem, ContentCategory, TopicConfig } from '../types';

function publishedTime(item: ClassifiedItem): number | null {
  if (!item.publishedAt) return null;
  const time = Date.parse(item.publishedAt);
  return Number.isNaN(time) ? null : time;
}

/**
 * Score descending. Ties: more recent first, dated before undated,
 * otherwise input order.
 */
export function compareRanked(a: ClassifiedItem, b: ClassifiedItem): number {
  if (a.score !== b.score) return b.score - a.score;

  const timeA = publishedTime(a);
  const timeB = publishedTime(b);
  if (timeA !== null && timeB !== null) return timeB - timeA;
  if (timeA !== null) return -1;
  if (timeB !== null) return 1;
  return 0;
}

/**
 * Stable sort into final order. Does not modify the input.
 */
export function rankItems(items: readonly ClassifiedItem[]): ClassifiedItem[] {
  return [...items].sort(compareRanked);
}

// ============================================================
// DIGEST
// ============================================================

export interface TopicGroup {
  slug: string;
  displayName: string;
  items: ClassifiedItem[];
}

/**
 * The final hand-off: ranked, deduplicated, classified and capped.
 */
export interface Digest {
  /** Ranked reading list across all topics, capped */
  readingList: ClassifiedItem[];
  byCategory: Record<ContentCategory, ClassifiedItem[]>;
  byTopic: TopicGroup[];
  /** Must-follow items, never capped */
  mustFollow: ClassifiedItem[];
}

export function buildDigest(
  topicItems: readonly ClassifiedItem[],
  mustFollowItems: readonly ClassifiedItem[],
  topics: readonly TopicConfig[],
  readingListMax: number
): Digest {
  const readingList = rankItems(topicItems).slice(0, readingListMax);

  const byCategory: Record<ContentCategory, ClassifiedItem[]> = {
    'lab-pulse': [],
    'deep-dive': [],
    general: [],
  };
  for (const item of readingList) {
    byCategory[item.category].push(item);
  }

  const byTopic = topics.map(topic => ({
    slug: topic.slug,
    displayName: topic.displayName,
    items: readingList.filter(item => item.topicSlug === topic.slug),
  }));

  return {
    readingList,
    byCategory,
    byTopic,
    mustFollow: rankItems(mustFollowItems),
  };
}
