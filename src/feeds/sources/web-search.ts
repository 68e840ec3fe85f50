/**
 * Scanline — Web Search Source
 *
 * Uses the Hacker News Algolia search API as the general web source:
 * stories there link out to articles, blogs and papers.
 */

import { z } from 'zod';
import { FetchSource, metrics } from '../base';
import type { SourceOptions } from '../base';
import type { ContentSource, RawContentRecord } from '../../types';

const ALGOLIA_BASE = 'https://hn.algolia.com/api/v1';

const HitSchema = z.object({
  objectID: z.string(),
  title: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  author: z.string().nullable().optional(),
  points: z.number().nullable().optional(),
  num_comments: z.number().nullable().optional(),
  created_at: z.string().optional(),
  story_text: z.string().nullable().optional(),
});

const SearchResponseSchema = z.object({
  hits: z.array(HitSchema),
});

export class WebSearchSource extends FetchSource {
  readonly name: ContentSource = 'web';

  constructor(options: SourceOptions = {}) {
    super(options);
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<RawContentRecord[]> {
    const since = Math.floor(this.sinceDate().getTime() / 1000);
    const params = new URLSearchParams({
      query,
      tags: 'story',
      hitsPerPage: String(Math.min(limit, 100)),
      numericFilters: `created_at_i>${since}`,
    });

    const res = await fetch(`${ALGOLIA_BASE}/search?${params.toString()}`, { signal });
    if (!res.ok) {
      throw new Error(`Web search failed: ${res.status}`);
    }

    const body = SearchResponseSchema.parse(await res.json());
    const records: RawContentRecord[] = [];

    for (const hit of body.hits) {
      if (!hit.title) continue;
      records.push({
        url: hit.url ?? `https://news.ycombinator.com/item?id=${hit.objectID}`,
        title: hit.title,
        author: hit.author ?? undefined,
        publishedAt: hit.created_at,
        engagement: metrics({ points: hit.points, comments: hit.num_comments }),
        bodyLength: hit.story_text?.length ?? 0,
      });
    }

    this.logger.debug('Web search completed', { query, results: records.length });
    return records.slice(0, limit);
  }
}
