/**
 * Scanline — Normalizer
 *
 * Converts raw search records into ContentItems and stamps the account
 * flags from configuration. Records without a usable URL or title are
 * dropped here.
 */

import type {
  ContentItem,
  ContentSource,
  QualityFilters,
  RawContentRecord,
} from '../types';
import { logger } from '../lib/logger';

export interface NormalizeContext {
  source: ContentSource;
  /** Empty for the must-follow track */
  topicSlug: string;
  filters: QualityFilters;
  /** Treat every item as a priority account (must-follow track) */
  forcePriority?: boolean;
}

function lower(values: readonly string[]): Set<string> {
  return new Set(values.map(v => v.toLowerCase()));
}

/**
 * Lookup sets for the account flags.
 */
export class AccountDirectory {
  private readonly priorityHandles: Set<string>;
  private readonly prioritySubreddits: Set<string>;
  private readonly labHandles: Set<string>;

  constructor(filters: QualityFilters) {
    this.priorityHandles = lower(filters.priorityAccounts.x);
    this.prioritySubreddits = lower(
      filters.priorityAccounts.redditSubreddits.map(s => s.replace(/^r\//i, ''))
    );
    this.labHandles = lower(Object.values(filters.labAccounts).flat());
  }

  isPriority(source: ContentSource, record: RawContentRecord): boolean {
    if (source === 'x' && record.author) {
      return this.priorityHandles.has(record.author.toLowerCase());
    }
    if (source === 'reddit' && record.community) {
      return this.prioritySubreddits.has(record.community.toLowerCase());
    }
    return false;
  }

  isLab(source: ContentSource, record: RawContentRecord): boolean {
    return source === 'x' && !!record.author && this.labHandles.has(record.author.toLowerCase());
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function normalizeRecord(
  record: RawContentRecord,
  ctx: NormalizeContext,
  accounts: AccountDirectory = new AccountDirectory(ctx.filters)
): ContentItem | null {
  const title = record.title.replace(/\s+/g, ' ').trim();
  if (!title || !isHttpUrl(record.url)) {
    return null;
  }

  return Object.freeze({
    source: ctx.source,
    url: record.url,
    title,
    author: record.author,
    publishedAt: record.publishedAt,
    engagement: Object.freeze({ ...record.engagement }),
    bodyLength: record.bodyLength ?? 0,
    excerpt: record.excerpt,
    community: record.community,
    topicSlug: ctx.topicSlug,
    isPriorityAccount: ctx.forcePriority === true || accounts.isPriority(ctx.source, record),
    isLabAccount: accounts.isLab(ctx.source, record),
  });
}

export function normalizeRecords(
  records: readonly RawContentRecord[],
  ctx: NormalizeContext
): ContentItem[] {
  const accounts = new AccountDirectory(ctx.filters);
  const items: ContentItem[] = [];
  let skipped = 0;

  for (const record of records) {
    const item = normalizeRecord(record, ctx, accounts);
    if (item) {
      items.push(item);
    } else {
      skipped++;
    }
  }

  if (skipped > 0) {
    logger.warn('Skipped unusable records', { source: ctx.source, topic: ctx.topicSlug, skipped });
  }

  return items;
}
