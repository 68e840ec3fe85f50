/**
 * Scanline — Fetch Source Base
 *
 * Abstract base class for search sources. Each source turns a query
 * into raw records; metrics the platform does not report stay absent.
 */

import type { ContentSource, RawContentRecord } from '../types';
import { logger } from '../lib/logger';
import type { Logger } from '../lib/logger';

export interface SourceOptions {
  /** Only return content newer than this many days, where the platform supports it */
  lookbackDays?: number;
  /** Clock used for lookback windows */
  now?: () => Date;
}

export abstract class FetchSource {
  abstract readonly name: ContentSource;

  protected readonly lookbackDays: number;
  protected readonly now: () => Date;
  protected readonly logger: Logger;

  constructor(options: SourceOptions = {}) {
    this.lookbackDays = options.lookbackDays ?? 1;
    this.now = options.now ?? (() => new Date());
    this.logger = logger.child({ source: this.constructor.name });
  }

  /**
   * Search the platform. Returns at most `limit` records.
   * An aborted `signal` cancels the request in flight.
   */
  abstract search(query: string, limit: number, signal?: AbortSignal): Promise<RawContentRecord[]>;

  /**
   * Search for posts by specific accounts. Only sources with a notion of
   * followed accounts support this.
   */
  supportsAccountSearch(): boolean {
    return false;
  }

  accountQuery(handles: readonly string[]): string {
    throw new Error(`${this.name} does not support account search (${handles.join(', ')})`);
  }

  protected sinceDate(): Date {
    return new Date(this.now().getTime() - this.lookbackDays * 24 * 60 * 60 * 1000);
  }
}

/**
 * Keep only finite numeric metrics; null or missing values stay absent.
 */
export function metrics(
  values: Record<string, number | null | undefined>
): Partial<Record<string, number>> {
  const result: Partial<Record<string, number>> = {};
  for (const [key, value] of Object.entries(values)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      result[key] = value;
    }
  }
  return result;
}
