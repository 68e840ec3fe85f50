/**
 * Scanline — Matching Module
 *
 * Deterministic item-level stages: spam filter, quality scorer,
 * classifier and ranker. None of them performs I/O.
 */

export { SpamFilter, type SpamFamily, type SpamVerdict } from './spam-filter';
export { QualityScorer, isLongForm, type FloorCheck, type ScoreOutcome } from './scorer';
export { Classifier, classifyItem } from './classifier';
export {
  buildDigest,
  compareRanked,
  rankItems,
  type Digest,
  type TopicGroup,
} from './ranker';
