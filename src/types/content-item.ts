/**
 * Scanline — Content Item Types
 *
 * Every search result is normalized to a ContentItem before it enters
 * the pipeline. Stages never mutate an item: they return a decorated copy.
 */

// ============================================================
// ENUMS
// ============================================================

export type ContentSource = 'reddit' | 'x' | 'web';

export type ContentCategory = 'lab-pulse' | 'deep-dive' | 'general';

export const CONTENT_CATEGORIES: readonly ContentCategory[] = [
  'lab-pulse',
  'deep-dive',
  'general',
];

/**
 * Engagement metrics by name (score, comments, likes, reposts, points...).
 * A missing key means the source did not report the metric: unknown, not zero.
 */
export type EngagementMetrics = Readonly<Partial<Record<string, number>>>;

// ============================================================
// RAW RECORDS (fetch collaborator output)
// ============================================================

export interface RawContentRecord {
  url: string;
  title: string;
  author?: string;
  publishedAt?: string;
  engagement: EngagementMetrics;
  bodyLength?: number;
  excerpt?: string;
  /** Subreddit for reddit items */
  community?: string;
}

// ============================================================
// CONTENT ITEM
// ============================================================

export interface ContentItem {
  readonly source: ContentSource;
  readonly url: string;
  readonly title: string;
  readonly author?: string;
  readonly publishedAt?: string;
  readonly engagement: EngagementMetrics;
  readonly bodyLength: number;
  readonly excerpt?: string;
  readonly community?: string;
  /** Empty for must-follow items */
  readonly topicSlug: string;
  readonly isPriorityAccount: boolean;
  readonly isLabAccount: boolean;

  // Decorations, absent until the stage has run
  readonly spamFlag?: boolean;
  readonly spamReason?: string;
  readonly score?: number;
  readonly category?: ContentCategory;
}

export type ScoredItem = ContentItem & { readonly score: number };

export type ClassifiedItem = ScoredItem & { readonly category: ContentCategory };

// ============================================================
// FINGERPRINT
// ============================================================

export interface Fingerprint {
  /** Lower-cased URL without scheme, tracking params, fragment or trailing slash */
  readonly url: string;
  /** Lower-cased title with collapsed whitespace */
  readonly title: string;
}

// ============================================================
// DROP ACCOUNTING
// ============================================================

export type DropReason = 'spam' | 'engagement-floor' | 'duplicate';

export type DropCounts = Record<DropReason, number>;

export function emptyDropCounts(): DropCounts {
  return { spam: 0, 'engagement-floor': 0, duplicate: 0 };
}
