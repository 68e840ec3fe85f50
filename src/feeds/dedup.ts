/**
 * Scanline — Cross Deduplication
 *
 * Removes items already present in the vault and items already accepted
 * earlier in the same run. First occurrence wins, so batches must be fed
 * in configured topic order with the must-follow track last.
 */

import type { ClassifiedItem } from '../types';
import { fingerprintOf } from '../lib/fingerprint';
import { logger } from '../lib/logger';
import { FingerprintSet } from './history-index';
import type { FingerprintMatch } from './history-index';

export interface DuplicateDrop {
  item: ClassifiedItem;
  track: string;
  reason: 'history' | 'batch';
  match: FingerprintMatch;
}

export interface DedupResult {
  survivors: ClassifiedItem[];
  duplicates: DuplicateDrop[];
  totalProcessed: number;
}

export class CrossDeduplicator {
  private readonly accepted: FingerprintSet;

  constructor(
    private readonly history: FingerprintSet,
    titleSimilarity: number = 1
  ) {
    this.accepted = new FingerprintSet(titleSimilarity);
  }

  /**
   * Filter one track's items. Survivors join the batch-so-far set,
   * so later calls see them.
   */
  filter(items: readonly ClassifiedItem[], track: string): DedupResult {
    const survivors: ClassifiedItem[] = [];
    const duplicates: DuplicateDrop[] = [];

    for (const item of items) {
      const fingerprint = fingerprintOf(item);

      const seenBefore = this.history.lookup(fingerprint);
      if (seenBefore) {
        duplicates.push({ item, track, reason: 'history', match: seenBefore });
        continue;
      }

      const seenThisRun = this.accepted.lookup(fingerprint);
      if (seenThisRun) {
        duplicates.push({ item, track, reason: 'batch', match: seenThisRun });
        continue;
      }

      this.accepted.add(fingerprint, track);
      survivors.push(item);
    }

    logger.debug('Cross dedup completed', {
      track,
      total: items.length,
      survivors: survivors.length,
      history: duplicates.filter(d => d.reason === 'history').length,
      batch: duplicates.filter(d => d.reason === 'batch').length,
    });

    return { survivors, duplicates, totalProcessed: items.length };
  }
}

export interface TrackBatch {
  track: string;
  items: readonly ClassifiedItem[];
}

/**
 * Deduplicate every track in order against the history and each other.
 */
export function crossDeduplicate(
  batches: readonly TrackBatch[],
  history: FingerprintSet,
  titleSimilarity: number = 1
): { results: Map<string, DedupResult>; duplicates: DuplicateDrop[] } {
  const dedup = new CrossDeduplicator(history, titleSimilarity);
  const results = new Map<string, DedupResult>();
  const duplicates: DuplicateDrop[] = [];

  for (const batch of batches) {
    const result = dedup.filter(batch.items, batch.track);
    results.set(batch.track, result);
    duplicates.push(...result.duplicates);
  }

  logger.info('Deduplication completed', {
    tracks: batches.length,
    duplicates: duplicates.length,
    survivors: [...results.values()].reduce((sum, r) => sum + r.survivors.length, 0),
  });

  return { results, duplicates };
}
