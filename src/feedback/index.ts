/**
 * Scanline — Feedback Module
 *
 * Tag-driven feedback loop over previously written daily notes.
 */

export {
  PromotionTracker,
  type PromotionTrackerOptions,
  type SweepOptions,
  type SweepResult,
} from './promotion';

export {
  JsonlRecordStore,
  listPromotedFingerprints,
  feedbackStats,
  PROMOTIONS_FILE,
  FEEDBACK_FILE,
  type RecordStore,
} from './record-store';
