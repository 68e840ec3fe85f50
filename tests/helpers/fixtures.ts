/**
 * Shared builders for pipeline tests.
 */

import { parseConfig } from '../../src/lib/config';
import { FetchSource } from '../../src/feeds/base';
import type {
  ClassifiedItem,
  ContentItem,
  ContentSource,
  PipelineConfig,
  PipelineConfigInput,
  RawContentRecord,
} from '../../src/types';

export function baseConfigInput(): PipelineConfigInput {
  return {
    topics: [
      { slug: 'agents', displayName: 'Agent Development', weight: 1.2, searchQueries: ['ai agents'] },
      { slug: 'rag', displayName: 'RAG & AI Search', weight: 0.9, searchQueries: ['rag pipeline'] },
    ],
    run: {
      corpusPath: 'vault',
      sources: ['reddit', 'x', 'web'],
      fetchTimeoutMs: 1000,
    },
  };
}

export function makeConfig(patch?: (input: PipelineConfigInput) => void): PipelineConfig {
  const input = baseConfigInput();
  patch?.(input);
  return parseConfig(input, {});
}

export function makeItem(overrides: Partial<ContentItem> = {}): ContentItem {
  return {
    source: 'reddit',
    url: 'https://example.com/post',
    title: 'A reasonably long example title',
    engagement: {},
    bodyLength: 0,
    topicSlug: 'agents',
    isPriorityAccount: false,
    isLabAccount: false,
    ...overrides,
  };
}

export function makeClassified(overrides: Partial<ClassifiedItem> = {}): ClassifiedItem {
  return {
    ...makeItem(overrides),
    score: 0,
    category: 'general',
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<RawContentRecord> = {}): RawContentRecord {
  return {
    url: 'https://example.com/post',
    title: 'A reasonably long example title',
    engagement: {},
    ...overrides,
  };
}

type Responder = (
  query: string,
  limit: number,
  signal?: AbortSignal
) => RawContentRecord[] | Promise<RawContentRecord[]>;

/**
 * Fetch source that answers from a function and records its calls.
 */
export class StubSource extends FetchSource {
  readonly name: ContentSource;
  readonly calls: Array<{ query: string; limit: number }> = [];

  constructor(
    name: ContentSource,
    private readonly responder: Responder,
    private readonly accountSearch = false
  ) {
    super();
    this.name = name;
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<RawContentRecord[]> {
    this.calls.push({ query, limit });
    return this.responder(query, limit, signal);
  }

  supportsAccountSearch(): boolean {
    return this.accountSearch;
  }

  accountQuery(handles: readonly string[]): string {
    return handles.map(h => `from:${h}`).join(' OR ');
  }
}

export function failingSource(name: ContentSource, message = 'upstream 503'): StubSource {
  return new StubSource(name, () => {
    throw new Error(message);
  });
}
