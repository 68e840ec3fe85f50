/**
 * Scanline — Pipeline Module
 */

export {
  RunCoordinator,
  type PromotionCounts,
  type RunDependencies,
  type RunMode,
  type RunSummary,
  type TrackCounts,
} from './run-coordinator';

export { parseArgs, UsageError, USAGE, type CliOptions } from './run-mode';
