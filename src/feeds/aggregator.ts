/**
 * Scanline — Topic Orchestrator
 *
 * Runs every topic track and the must-follow track:
 * 1. Fetch from each enabled source, bounded to itemsPerTopic per source
 * 2. Normalize raw records
 * 3. Spam filter (topics only)
 * 4. Engagement floor and scoring (floor skipped for must-follow)
 * 5. Classification
 *
 * Tracks share no mutable state and run through a bounded worker pool.
 * A failing fetch costs that track its items, never the run, unless
 * every track fails.
 */

import type {
  AccountConfig,
  ClassifiedItem,
  ContentItem,
  ContentSource,
  PipelineConfig,
  RawContentRecord,
  TopicConfig,
} from '../types';
import type { FetchSource } from './base';
import type { SourceSet } from './sources';
import { normalizeRecords } from './normalizer';
import { SpamFilter } from '../matching/spam-filter';
import { QualityScorer } from '../matching/scorer';
import { Classifier } from '../matching/classifier';
import { fetchConcurrency } from '../lib/config';
import { mapWithConcurrency, withTimeout } from '../lib/concurrency';
import { FetchFailureError } from '../lib/errors';
import { normalizeUrl } from '../lib/fingerprint';
import { errorMessage, logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export const MUST_FOLLOW_TRACK = 'must-follow';

/** Handles per batched `from:` query */
export const ACCOUNTS_PER_QUERY = 10;

const MAX_ACCOUNT_RESULTS = 100;

export interface TrackDrop {
  item: ContentItem;
  reason: 'spam' | 'engagement-floor';
  detail: string;
}

export interface TrackResult {
  /** Topic slug, or MUST_FOLLOW_TRACK */
  track: string;
  items: ClassifiedItem[];
  /** Raw records returned by the sources, after per-source URL dedup */
  fetched: number;
  dropped: TrackDrop[];
  errors: FetchFailureError[];
  /** True when no fetch call for this track succeeded */
  failed: boolean;
  durationMs: number;
}

export interface OrchestratorResult {
  /** In configured topic order */
  topics: TrackResult[];
  /** Null when no must-follow accounts are configured */
  mustFollow: TrackResult | null;
}

interface FetchPlanEntry {
  source: FetchSource;
  query: string;
  limit: number;
}

interface FetchOutcome {
  records: Array<{ source: ContentSource; record: RawContentRecord }>;
  errors: FetchFailureError[];
  attempted: number;
  succeeded: number;
}

// ============================================================
// ORCHESTRATOR
// ============================================================

export class TopicOrchestrator {
  private readonly spamFilter: SpamFilter;
  private readonly scorer: QualityScorer;
  private readonly classifier: Classifier;
  private readonly log = logger.child({ component: 'TopicOrchestrator' });

  constructor(
    private readonly config: PipelineConfig,
    private readonly sources: SourceSet
  ) {
    this.spamFilter = new SpamFilter(config.qualityFilters);
    this.scorer = new QualityScorer(config.qualityFilters);
    this.classifier = new Classifier(config.qualityFilters);
  }

  /**
   * Enabled sources in configured order.
   */
  private enabledSources(): FetchSource[] {
    const result: FetchSource[] = [];
    for (const name of this.config.run.sources) {
      const source = this.sources[name];
      if (source) result.push(source);
    }
    return result;
  }

  async runTopic(topic: TopicConfig): Promise<TrackResult> {
    const start = Date.now();
    const limit = this.config.run.itemsPerTopic;
    const sources = this.enabledSources();

    const outcome = await this.fetchPerSource(
      topic.slug,
      sources.map(source => topic.searchQueries.map(query => ({ source, query, limit }))),
      limit
    );

    const dropped: TrackDrop[] = [];
    const items: ClassifiedItem[] = [];

    for (const item of this.normalize(outcome, topic.slug, false)) {
      const checked = this.spamFilter.check(item);
      if (checked.spamFlag) {
        dropped.push({ item: checked, reason: 'spam', detail: checked.spamReason ?? 'spam' });
        continue;
      }

      const scored = this.scorer.evaluate(checked, topic.weight);
      if (!scored.kept) {
        dropped.push({
          item: checked,
          reason: 'engagement-floor',
          detail: `${scored.metric} ${scored.value} < ${scored.floor}`,
        });
        continue;
      }

      items.push(this.classifier.decorate(scored.item));
    }

    const result = this.finish(topic.slug, start, outcome, items, dropped, sources.length);

    this.log.info('Topic scanned', {
      topic: topic.slug,
      fetched: result.fetched,
      kept: items.length,
      spam: dropped.filter(d => d.reason === 'spam').length,
      belowFloor: dropped.filter(d => d.reason === 'engagement-floor').length,
      errors: result.errors.length,
    });

    return result;
  }

  /**
   * Every post from a tracked account is kept: no spam check, no floor.
   */
  async runMustFollow(accounts: readonly AccountConfig[]): Promise<TrackResult> {
    const start = Date.now();
    const source = this.sources.x;

    if (!source || !source.supportsAccountSearch()) {
      const error = new FetchFailureError(MUST_FOLLOW_TRACK, 'no source supports account search');
      this.log.warn('Must-follow track skipped', { error: error.message });
      return {
        track: MUST_FOLLOW_TRACK,
        items: [],
        fetched: 0,
        dropped: [],
        errors: [error],
        failed: true,
        durationMs: Date.now() - start,
      };
    }

    const plan = accountQueryPlan(accounts).map(handles => ({
      source,
      query: source.accountQuery(handles),
      limit: Math.min(this.config.run.itemsPerTopic * handles.length, MAX_ACCOUNT_RESULTS),
    }));

    const outcome = await this.fetchAll(MUST_FOLLOW_TRACK, plan);
    const items = this.normalize(outcome, '', true).map(item =>
      this.classifier.decorate(Object.freeze({ ...item, score: this.scorer.score(item, 1) }))
    );

    const result = this.finish(MUST_FOLLOW_TRACK, start, outcome, items, [], 1);

    this.log.info('Must-follow scanned', {
      accounts: accounts.length,
      queries: plan.length,
      kept: result.items.length,
      errors: result.errors.length,
    });

    return result;
  }

  /**
   * Run all topic tracks and the must-follow track through the pool.
   * Throws FetchFailureError only if every track failed.
   */
  async runAll(
    topics: readonly TopicConfig[],
    accounts: readonly AccountConfig[]
  ): Promise<OrchestratorResult> {
    type Task = () => Promise<TrackResult>;
    const tasks: Task[] = topics.map(topic => () => this.runTopic(topic));
    if (accounts.length > 0) {
      tasks.push(() => this.runMustFollow(accounts));
    }

    const limit = fetchConcurrency(this.config, topics.length);
    const results = await mapWithConcurrency(tasks, limit, task => task());

    const topicResults = results.slice(0, topics.length);
    const mustFollow = accounts.length > 0 ? results[topics.length] : null;

    if (results.length > 0 && results.every(r => r.failed)) {
      const reasons = results.flatMap(r => r.errors.map(e => e.message));
      throw new FetchFailureError('all tracks', reasons.join('; ') || 'no results');
    }

    return { topics: topicResults, mustFollow };
  }

  // ============================================================
  // FETCH HELPERS
  // ============================================================

  /**
   * Per source, run queries in order until `limit` distinct records are in.
   */
  private async fetchPerSource(
    track: string,
    plans: FetchPlanEntry[][],
    limit: number
  ): Promise<FetchOutcome> {
    const total: FetchOutcome = { records: [], errors: [], attempted: 0, succeeded: 0 };

    for (const plan of plans) {
      const outcome = await this.fetchAll(track, plan, limit);
      total.records.push(...outcome.records);
      total.errors.push(...outcome.errors);
      total.attempted += outcome.attempted;
      total.succeeded += outcome.succeeded;
    }

    return total;
  }

  private async fetchAll(
    track: string,
    plan: readonly FetchPlanEntry[],
    limit: number = Number.POSITIVE_INFINITY
  ): Promise<FetchOutcome> {
    const outcome: FetchOutcome = { records: [], errors: [], attempted: 0, succeeded: 0 };
    const seen = new Set<string>();

    for (const entry of plan) {
      if (outcome.records.length >= limit) break;

      outcome.attempted++;
      try {
        const records = await withTimeout(
          signal => entry.source.search(entry.query, entry.limit, signal),
          this.config.run.fetchTimeoutMs,
          `${entry.source.name} search`
        );
        outcome.succeeded++;

        for (const record of records) {
          if (outcome.records.length >= limit) break;
          const key = normalizeUrl(record.url);
          if (seen.has(key)) continue;
          seen.add(key);
          outcome.records.push({ source: entry.source.name, record });
        }
      } catch (error) {
        const failure = new FetchFailureError(
          track,
          `${entry.source.name} "${entry.query}": ${errorMessage(error)}`,
          { cause: error }
        );
        outcome.errors.push(failure);
        this.log.warn('Fetch failed', { track, source: entry.source.name, error: failure.message });
      }
    }

    return outcome;
  }

  private normalize(outcome: FetchOutcome, topicSlug: string, forcePriority: boolean): ContentItem[] {
    const bySource = new Map<ContentSource, RawContentRecord[]>();
    for (const { source, record } of outcome.records) {
      const list = bySource.get(source) ?? [];
      list.push(record);
      bySource.set(source, list);
    }

    const items: ContentItem[] = [];
    for (const [source, records] of bySource) {
      items.push(
        ...normalizeRecords(records, {
          source,
          topicSlug,
          filters: this.config.qualityFilters,
          forcePriority,
        })
      );
    }
    return items;
  }

  private finish(
    track: string,
    start: number,
    outcome: FetchOutcome,
    items: ClassifiedItem[],
    dropped: TrackDrop[],
    sourceCount: number
  ): TrackResult {
    const errors = [...outcome.errors];
    if (sourceCount === 0) {
      errors.push(new FetchFailureError(track, 'no sources enabled'));
    }

    return {
      track,
      items,
      fetched: outcome.records.length,
      dropped,
      errors,
      failed: outcome.succeeded === 0,
      durationMs: Date.now() - start,
    };
  }
}

// ============================================================
// MUST-FOLLOW QUERIES
// ============================================================

/**
 * Solo accounts get their own query; the rest are batched per group,
 * in config order, at most ACCOUNTS_PER_QUERY handles per query.
 */
export function accountQueryPlan(accounts: readonly AccountConfig[]): string[][] {
  const plan: string[][] = [];
  const groups = new Map<string, string[]>();

  for (const account of accounts) {
    if (account.solo) {
      plan.push([account.handle]);
      continue;
    }
    const handles = groups.get(account.group) ?? [];
    handles.push(account.handle);
    groups.set(account.group, handles);
  }

  for (const handles of groups.values()) {
    for (let i = 0; i < handles.length; i += ACCOUNTS_PER_QUERY) {
      plan.push(handles.slice(i, i + ACCOUNTS_PER_QUERY));
    }
  }

  return plan;
}
