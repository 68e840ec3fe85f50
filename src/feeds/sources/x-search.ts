/**
 * Scanline — X Search Source
 *
 * X API v2 recent search through twitter-api-v2, authenticated with an
 * app-only bearer token. Also serves the must-follow track via `from:` queries.
 */

import { TwitterApi } from 'twitter-api-v2';
import type { TweetV2, UserV2 } from 'twitter-api-v2';
import { FetchSource, metrics } from '../base';
import type { SourceOptions } from '../base';
import type { ContentSource, RawContentRecord } from '../../types';

const TITLE_CHARS = 100;
const EXCERPT_CHARS = 280;
const MIN_RESULTS = 10;
const MAX_RESULTS = 100;

export interface XSearchOptions extends SourceOptions {
  bearerToken: string;
  /** Injected client, mainly for tests */
  client?: TwitterApi;
}

export function tweetTitle(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > TITLE_CHARS ? `${flat.slice(0, TITLE_CHARS - 3)}...` : flat;
}

export class XSearchSource extends FetchSource {
  readonly name: ContentSource = 'x';
  private readonly client: TwitterApi;

  constructor(options: XSearchOptions) {
    super(options);
    this.client = options.client ?? new TwitterApi(options.bearerToken);
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<RawContentRecord[]> {
    // twitter-api-v2 takes no AbortSignal; an aborted search issues no request
    // and discards a late response
    signal?.throwIfAborted();
    const paginator = await this.client.readOnly.v2.search(query, {
      max_results: Math.min(Math.max(limit, MIN_RESULTS), MAX_RESULTS),
      start_time: this.sinceDate().toISOString(),
      'tweet.fields': ['created_at', 'public_metrics', 'author_id'],
      expansions: ['author_id'],
      'user.fields': ['username'],
    });
    signal?.throwIfAborted();

    const records = paginator.tweets
      .slice(0, limit)
      .map(tweet => this.toRecord(tweet, paginator.includes.author(tweet)));

    this.logger.debug('X search completed', { query, results: records.length });
    return records;
  }

  supportsAccountSearch(): boolean {
    return true;
  }

  accountQuery(handles: readonly string[]): string {
    const clauses = handles.map(handle => `from:${handle}`);
    return clauses.length > 1 ? `(${clauses.join(' OR ')})` : clauses.join('');
  }

  private toRecord(tweet: TweetV2, author: UserV2 | undefined): RawContentRecord {
    const text = tweet.text;
    const handle = author?.username;
    const url = handle
      ? `https://x.com/${handle}/status/${tweet.id}`
      : `https://x.com/i/web/status/${tweet.id}`;
    const pm = tweet.public_metrics;

    return {
      url,
      title: tweetTitle(text),
      author: handle,
      publishedAt: tweet.created_at,
      engagement: metrics({
        likes: pm?.like_count,
        reposts: pm?.retweet_count,
        replies: pm?.reply_count,
        quotes: pm?.quote_count,
      }),
      bodyLength: text.length,
      excerpt: text.slice(0, EXCERPT_CHARS),
    };
  }
}
