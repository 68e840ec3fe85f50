/**
 * Scanline — Reddit Search Source
 *
 * Searches Reddit through the public JSON listing endpoint.
 * No authentication; requests carry a descriptive User-Agent.
 */

import { z } from 'zod';
import { FetchSource, metrics } from '../base';
import type { SourceOptions } from '../base';
import type { ContentSource, RawContentRecord } from '../../types';

const REDDIT_BASE = 'https://www.reddit.com';
const USER_AGENT = 'scanline/0.1 (daily research digest)';
const EXCERPT_CHARS = 280;

const RedditPostSchema = z.object({
  title: z.string(),
  url: z.string().optional(),
  permalink: z.string(),
  author: z.string().optional(),
  subreddit: z.string().optional(),
  selftext: z.string().optional().default(''),
  is_self: z.boolean().optional().default(false),
  score: z.number().nullable().optional(),
  num_comments: z.number().nullable().optional(),
  created_utc: z.number().optional(),
});

const RedditListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ kind: z.string(), data: RedditPostSchema })),
  }),
});

type RedditPost = z.infer<typeof RedditPostSchema>;

function timeWindow(days: number): 'day' | 'week' | 'month' | 'year' {
  if (days <= 1) return 'day';
  if (days <= 7) return 'week';
  if (days <= 31) return 'month';
  return 'year';
}

export class RedditSearchSource extends FetchSource {
  readonly name: ContentSource = 'reddit';

  constructor(options: SourceOptions = {}) {
    super(options);
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<RawContentRecord[]> {
    const params = new URLSearchParams({
      q: query,
      limit: String(Math.min(limit, 100)),
      sort: 'relevance',
      t: timeWindow(this.lookbackDays),
      raw_json: '1',
    });

    const res = await fetch(`${REDDIT_BASE}/search.json?${params.toString()}`, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      signal,
    });
    if (!res.ok) {
      throw new Error(`Reddit search failed: ${res.status}`);
    }

    const listing = RedditListingSchema.parse(await res.json());
    const records = listing.data.children
      .filter(child => child.kind === 't3')
      .map(child => this.toRecord(child.data))
      .slice(0, limit);

    this.logger.debug('Reddit search completed', { query, results: records.length });
    return records;
  }

  private toRecord(post: RedditPost): RawContentRecord {
    const permalink = `${REDDIT_BASE}${post.permalink}`;
    // Link posts point at the article; self posts at the thread
    const url = !post.is_self && post.url && /^https?:\/\//.test(post.url) ? post.url : permalink;

    return {
      url,
      title: post.title,
      author: post.author,
      publishedAt: post.created_utc !== undefined
        ? new Date(post.created_utc * 1000).toISOString()
        : undefined,
      engagement: metrics({ score: post.score, comments: post.num_comments }),
      bodyLength: post.selftext.length,
      excerpt: post.selftext ? post.selftext.slice(0, EXCERPT_CHARS) : undefined,
      community: post.subreddit,
    };
  }
}
