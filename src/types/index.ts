/**
 * Scanline — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Content items
export type {
  ContentSource,
  ContentCategory,
  EngagementMetrics,
  RawContentRecord,
  ContentItem,
  ScoredItem,
  ClassifiedItem,
  Fingerprint,
  DropReason,
  DropCounts,
} from './content-item';
export { CONTENT_CATEGORIES, emptyDropCounts } from './content-item';

// Configuration
export type {
  DeepReadonly,
  TopicConfig,
  AccountConfig,
  ClaimRule,
  SpamDetectionConfig,
  QualityFilters,
  RunParams,
  TagConfig,
  PipelineConfig,
  PipelineConfigInput,
} from './config';
export { PipelineConfigSchema } from './config';

// Records
export type {
  FeedbackTag,
  PromotionRecord,
  FeedbackRecord,
  FeedbackStats,
} from './records';
