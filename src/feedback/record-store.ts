/**
 * Scanline — Record Store
 *
 * Append-only logs of promotions and feedback, one JSON object per line
 * in the state directory. Records are only appended after the corpus
 * rewrite that resolves them has succeeded.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { FeedbackRecord, FeedbackStats, PromotionRecord } from '../types';
import { errorMessage, logger } from '../lib/logger';

export interface RecordStore {
  appendPromotion(record: PromotionRecord): Promise<void>;
  appendFeedback(record: FeedbackRecord): Promise<void>;
  listPromotions(): Promise<PromotionRecord[]>;
  listFeedback(): Promise<FeedbackRecord[]>;
}

// ============================================================
// SCHEMAS
// ============================================================

const PromotionRecordSchema = z.object({
  id: z.string(),
  fingerprint: z.string(),
  topicSlug: z.string(),
  promotedAt: z.string(),
  title: z.string(),
  url: z.string(),
  libraryPath: z.string(),
  sourceNote: z.string(),
});

const FeedbackRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  url: z.string(),
  tag: z.enum(['good', 'bad']),
  notedAt: z.string(),
  sourceNote: z.string(),
});

// ============================================================
// JSONL STORE
// ============================================================

export const PROMOTIONS_FILE = 'promotions.jsonl';
export const FEEDBACK_FILE = 'feedback.jsonl';

export class JsonlRecordStore implements RecordStore {
  private readonly log = logger.child({ component: 'JsonlRecordStore' });

  constructor(private readonly dir: string) {}

  async appendPromotion(record: PromotionRecord): Promise<void> {
    await this.append(PROMOTIONS_FILE, record);
  }

  async appendFeedback(record: FeedbackRecord): Promise<void> {
    await this.append(FEEDBACK_FILE, record);
  }

  async listPromotions(): Promise<PromotionRecord[]> {
    return this.readAll(PROMOTIONS_FILE, PromotionRecordSchema);
  }

  async listFeedback(): Promise<FeedbackRecord[]> {
    return this.readAll(FEEDBACK_FILE, FeedbackRecordSchema);
  }

  private async append(file: string, record: object): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await appendFile(path.join(this.dir, file), `${JSON.stringify(record)}\n`, 'utf8');
  }

  private async readAll<T>(file: string, schema: z.ZodType<T>): Promise<T[]> {
    let raw: string;
    try {
      raw = await readFile(path.join(this.dir, file), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const records: T[] = [];
    raw.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      try {
        records.push(schema.parse(JSON.parse(line)));
      } catch (error) {
        this.log.warn('Skipping corrupt record', { file, line: index + 1, error: errorMessage(error) });
      }
    });
    return records;
  }
}

// ============================================================
// QUERIES
// ============================================================

export async function listPromotedFingerprints(store: RecordStore): Promise<Set<string>> {
  const promotions = await store.listPromotions();
  return new Set(promotions.map(p => p.fingerprint));
}

export async function feedbackStats(store: RecordStore): Promise<FeedbackStats> {
  const feedback = await store.listFeedback();
  return {
    totalGood: feedback.filter(f => f.tag === 'good').length,
    totalBad: feedback.filter(f => f.tag === 'bad').length,
  };
}
