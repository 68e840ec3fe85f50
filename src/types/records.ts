/**
 * Scanline — Promotion & Feedback Records
 *
 * Both logs are append-only. A record is written only after the tag
 * rewrite that resolves it has been committed to the corpus.
 */

export type FeedbackTag = 'good' | 'bad';

export interface PromotionRecord {
  id: string;
  /** Normalized URL of the promoted item */
  fingerprint: string;
  topicSlug: string;
  promotedAt: string;
  title: string;
  url: string;
  libraryPath: string;
  sourceNote: string;
}

export interface FeedbackRecord {
  id: string;
  title: string;
  url: string;
  tag: FeedbackTag;
  notedAt: string;
  sourceNote: string;
}

export interface FeedbackStats {
  totalGood: number;
  totalBad: number;
}
