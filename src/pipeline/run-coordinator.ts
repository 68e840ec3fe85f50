/**
 * Scanline — Run Coordinator
 *
 * One invocation, one pass, in strict stage order:
 * 1. Promotion sweep (must finish before the corpus is indexed)
 * 2. History index
 * 3. Topic and must-follow tracks (bounded pool)
 * 4. Cross deduplication (sequential, configured topic order, must-follow last)
 * 5. Rank, cap and group
 * 6. Synthesis
 * 7. Daily note write
 *
 * Index and corpus failures end the run; everything else is recorded
 * in the summary and the run continues.
 */

import { nanoid } from 'nanoid';
import type {
  ClassifiedItem,
  DropCounts,
  PipelineConfig,
  TopicConfig,
} from '../types';
import { emptyDropCounts } from '../types';
import type { Corpus, NoteFormat } from '../corpus';
import type { SourceSet } from '../feeds/sources';
import { TopicOrchestrator } from '../feeds/aggregator';
import type { OrchestratorResult, TrackResult } from '../feeds/aggregator';
import { buildHistoryIndex, historyFolders } from '../feeds/history-index';
import { crossDeduplicate } from '../feeds/dedup';
import type { DedupResult, TrackBatch } from '../feeds/dedup';
import { buildDigest } from '../matching/ranker';
import type { Digest } from '../matching/ranker';
import { PromotionTracker } from '../feedback/promotion';
import type { SweepResult } from '../feedback/promotion';
import { feedbackStats } from '../feedback/record-store';
import type { RecordStore } from '../feedback/record-store';
import { ExtractiveSynthesizer } from '../delivery/synthesis';
import type { SynthesisSections, Synthesizer } from '../delivery/synthesis';
import { dailyNotePath, noteHeadings, renderDailyNote } from '../delivery/daily-note';
import { ConfigValidationError, isScanlineError } from '../lib/errors';
import type { PipelineStage } from '../lib/errors';
import { errorMessage, logger, timeOperation } from '../lib/logger';
import type { Logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export type RunMode =
  | { kind: 'full' }
  | { kind: 'single-topic'; slug: string }
  | { kind: 'preview' }
  | { kind: 'promote-only' };

export interface TrackCounts {
  track: string;
  fetched: number;
  spam: number;
  belowFloor: number;
  duplicates: number;
  /** Survivors of deduplication, before the reading-list cap */
  kept: number;
  failed: boolean;
  errors: string[];
}

export interface PromotionCounts {
  promotions: number;
  feedback: number;
  alreadyPromoted: number;
  conflicts: string[];
}

export interface RunSummary {
  runId: string;
  mode: RunMode['kind'];
  startedAt: string;
  durationMs: number;
  promotion: PromotionCounts | null;
  tracks: TrackCounts[];
  drops: DropCounts;
  readingList: number;
  synthesizer: string | null;
  /** Vault path of the written daily note */
  notePath: string | null;
  /** Rendered note, kept for preview runs */
  preview: string | null;
  fatal: { stage: PipelineStage; error: string } | null;
}

export interface RunDependencies {
  corpus: Corpus;
  sources: SourceSet;
  store: RecordStore;
  synthesizer: Synthesizer;
  format?: NoteFormat;
  now?: () => Date;
}

// ============================================================
// COORDINATOR
// ============================================================

export class RunCoordinator {
  private readonly now: () => Date;
  private readonly log = logger.child({ component: 'RunCoordinator' });

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: RunDependencies
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(mode: RunMode): Promise<RunSummary> {
    const started = this.now();
    const summary: RunSummary = {
      runId: nanoid(10),
      mode: mode.kind,
      startedAt: started.toISOString(),
      durationMs: 0,
      promotion: null,
      tracks: [],
      drops: emptyDropCounts(),
      readingList: 0,
      synthesizer: null,
      notePath: null,
      preview: null,
      fatal: null,
    };
    const log = this.log.child({ runId: summary.runId });
    const dryRun = mode.kind === 'preview';
    let stage: PipelineStage = 'config';

    log.info('Run started', { mode: mode.kind });

    try {
      const topics = this.selectTopics(mode);

      stage = 'promotion';
      const sweep = await timeOperation('Promotion sweep', () =>
        new PromotionTracker(this.config, this.deps.corpus, this.deps.store, {
          format: this.deps.format,
          now: this.now,
        }).sweep({ dryRun })
      );
      summary.promotion = promotionCounts(sweep);

      if (mode.kind === 'promote-only') {
        return this.finish(summary, started, log);
      }

      stage = 'history-index';
      const history = await timeOperation('History index', () =>
        buildHistoryIndex(this.deps.corpus, {
          folders: historyFolders(this.config),
          titleSimilarity: this.config.dedup.titleSimilarity,
          format: this.deps.format,
          ignoreTitles: noteHeadings(this.config),
        })
      );

      stage = 'fetch';
      const accounts = mode.kind === 'single-topic' ? [] : this.config.mustFollow;
      const orchestrator = new TopicOrchestrator(this.config, this.deps.sources);
      const tracks = await timeOperation('Topic tracks', () => orchestrator.runAll(topics, accounts));

      stage = 'dedup';
      const batches: TrackBatch[] = tracks.topics.map(t => ({ track: t.track, items: t.items }));
      if (tracks.mustFollow) {
        batches.push({ track: tracks.mustFollow.track, items: tracks.mustFollow.items });
      }
      const { results } = crossDeduplicate(batches, history, this.config.dedup.titleSimilarity);
      this.countTracks(summary, tracks, results);

      const topicItems: ClassifiedItem[] = tracks.topics.flatMap(
        t => results.get(t.track)?.survivors ?? []
      );
      const mustFollowItems = tracks.mustFollow
        ? results.get(tracks.mustFollow.track)?.survivors ?? []
        : [];
      const digest = buildDigest(topicItems, mustFollowItems, topics, this.config.run.readingListMax);
      summary.readingList = digest.readingList.length;

      stage = 'synthesis';
      const date = started.toISOString().slice(0, 10);
      const synthesis = await this.synthesize(digest, date, summary);

      stage = 'write';
      const lifetime = await feedbackStats(this.deps.store);
      const good = sweep.feedback.filter(f => f.tag === 'good').length;
      const content = renderDailyNote({
        date,
        digest,
        synthesis,
        config: this.config,
        feedback: { good, bad: sweep.feedback.length - good, lifetime },
      });

      if (dryRun) {
        summary.preview = content;
        return this.finish(summary, started, log);
      }

      const notePath = await dailyNotePath(this.config.run.outputPath, date, p =>
        this.deps.corpus.exists(p)
      );
      const created = await this.deps.corpus.create(notePath, content);
      if (!created) {
        throw new Error(`Could not create ${notePath}`);
      }
      summary.notePath = notePath;
      log.info('Daily note written', { notePath, items: digest.readingList.length });
    } catch (error) {
      const failedStage = isScanlineError(error) && error.stage === 'config' ? 'config' : stage;
      summary.fatal = { stage: failedStage, error: errorMessage(error) };
      log.error('Run aborted', { stage: failedStage, error: errorMessage(error) });
    }

    return this.finish(summary, started, log);
  }

  private selectTopics(mode: RunMode): readonly TopicConfig[] {
    if (mode.kind !== 'single-topic') return this.config.topics;

    const topic = this.config.topics.find(t => t.slug === mode.slug);
    if (!topic) {
      const known = this.config.topics.map(t => t.slug).join(', ');
      throw new ConfigValidationError([`topic "${mode.slug}" is not configured (known: ${known})`]);
    }
    return [topic];
  }

  /**
   * Synthesis failure falls back to the extractive result.
   */
  private async synthesize(digest: Digest, date: string, summary: RunSummary): Promise<SynthesisSections> {
    const primary = this.deps.synthesizer;
    try {
      const sections = await primary.summarize(digest, { date });
      summary.synthesizer = primary.name;
      return sections;
    } catch (error) {
      this.log.warn('Synthesis failed; using extractive summary', {
        synthesizer: primary.name,
        error: errorMessage(error),
      });
      const fallback = new ExtractiveSynthesizer();
      summary.synthesizer = fallback.name;
      return fallback.summarize(digest, { date });
    }
  }

  private countTracks(
    summary: RunSummary,
    tracks: OrchestratorResult,
    results: Map<string, DedupResult>
  ): void {
    const all: TrackResult[] = tracks.mustFollow ? [...tracks.topics, tracks.mustFollow] : tracks.topics;

    for (const track of all) {
      const dedup = results.get(track.track);
      const counts: TrackCounts = {
        track: track.track,
        fetched: track.fetched,
        spam: track.dropped.filter(d => d.reason === 'spam').length,
        belowFloor: track.dropped.filter(d => d.reason === 'engagement-floor').length,
        duplicates: dedup?.duplicates.length ?? 0,
        kept: dedup?.survivors.length ?? 0,
        failed: track.failed,
        errors: track.errors.map(e => e.message),
      };
      summary.tracks.push(counts);
      summary.drops.spam += counts.spam;
      summary.drops['engagement-floor'] += counts.belowFloor;
      summary.drops.duplicate += counts.duplicates;
    }
  }

  private finish(summary: RunSummary, started: Date, log: Logger): RunSummary {
    summary.durationMs = this.now().getTime() - started.getTime();
    log.info('Run finished', {
      mode: summary.mode,
      readingList: summary.readingList,
      drops: summary.drops,
      notePath: summary.notePath,
      fatal: summary.fatal?.stage ?? null,
      durationMs: summary.durationMs,
    });
    return summary;
  }
}

function promotionCounts(sweep: SweepResult): PromotionCounts {
  return {
    promotions: sweep.promotions.length,
    feedback: sweep.feedback.length,
    alreadyPromoted: sweep.alreadyPromoted,
    conflicts: sweep.conflicts.map(c => c.message),
  };
}
