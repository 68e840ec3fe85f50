/**
 * Scanline — Feeds Module
 *
 * Fetching, normalization, history index and cross-track deduplication.
 */

export { FetchSource, metrics, type SourceOptions } from './base';

export {
  createSources,
  RedditSearchSource,
  WebSearchSource,
  XSearchSource,
  tweetTitle,
  type SourceSet,
  type XSearchOptions,
} from './sources';

export {
  AccountDirectory,
  normalizeRecord,
  normalizeRecords,
  type NormalizeContext,
} from './normalizer';

export {
  FingerprintSet,
  HistoryIndex,
  buildHistoryIndex,
  historyFolders,
  type FingerprintMatch,
  type HistoryIndexOptions,
} from './history-index';

export {
  CrossDeduplicator,
  crossDeduplicate,
  type DedupResult,
  type DuplicateDrop,
  type TrackBatch,
} from './dedup';

export {
  TopicOrchestrator,
  accountQueryPlan,
  ACCOUNTS_PER_QUERY,
  MUST_FOLLOW_TRACK,
  type OrchestratorResult,
  type TrackDrop,
  type TrackResult,
} from './aggregator';
