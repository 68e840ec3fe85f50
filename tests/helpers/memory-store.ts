/**
 * In-memory RecordStore for tests.
 */

import type { RecordStore } from '../../src/feedback';
import type { FeedbackRecord, PromotionRecord } from '../../src/types';

export class MemoryRecordStore implements RecordStore {
  readonly promotions: PromotionRecord[] = [];
  readonly feedback: FeedbackRecord[] = [];
  /** When set, appends reject */
  failAppends = false;

  async appendPromotion(record: PromotionRecord): Promise<void> {
    if (this.failAppends) throw new Error('disk full');
    this.promotions.push(record);
  }

  async appendFeedback(record: FeedbackRecord): Promise<void> {
    if (this.failAppends) throw new Error('disk full');
    this.feedback.push(record);
  }

  async listPromotions(): Promise<PromotionRecord[]> {
    return [...this.promotions];
  }

  async listFeedback(): Promise<FeedbackRecord[]> {
    return [...this.feedback];
  }
}
