/**
 * Scanline — Promotion Tracker
 *
 * Sweeps daily notes for workflow tags and resolves each one:
 *   #keep  → library note + PromotionRecord, line rewritten to #kept
 *   #good  → FeedbackRecord, line rewritten to #good-noted
 *   #bad   → FeedbackRecord, line rewritten to #bad-noted
 *
 * Each tag moves pending → resolved in two phases. The record is computed
 * first, the line rewrite is committed, and only then is the record
 * appended. A failed rewrite discards the record; a failed append puts
 * the line back.
 */

import { nanoid } from 'nanoid';
import type { FeedbackRecord, FeedbackTag, PipelineConfig, PromotionRecord } from '../types';
import type { Corpus, NoteFormat, TaggedLine } from '../corpus';
import { markdownFormat } from '../corpus';
import { renderLibraryNote, slugify, uniqueNotePath } from '../delivery/library-note';
import { RewriteConflictError } from '../lib/errors';
import { normalizeUrl } from '../lib/fingerprint';
import { errorMessage, logger } from '../lib/logger';
import type { RecordStore } from './record-store';
import { listPromotedFingerprints } from './record-store';

// ============================================================
// TYPES
// ============================================================

export interface SweepOptions {
  /** Compute everything, write nothing */
  dryRun?: boolean;
}

export interface SweepResult {
  promotions: PromotionRecord[];
  feedback: FeedbackRecord[];
  conflicts: RewriteConflictError[];
  /** #keep lines whose item was promoted before; resolved without a new record */
  alreadyPromoted: number;
  notesScanned: number;
}

export interface PromotionTrackerOptions {
  format?: NoteFormat;
  now?: () => Date;
}

interface SweepState {
  dryRun: boolean;
  promoted: Set<string>;
  /** Normalized URL → existing library note path */
  library: Map<string, string>;
  result: SweepResult;
}

type Commit = { ok: true } | { ok: false; conflict: RewriteConflictError };

const DATE_IN_PATH_RE = /(\d{4}-\d{2}-\d{2})/;
const SUMMARY_RE = /^\s*[—–-]\s*(.+?)(?:\s+#[\w-]+)*\s*$/;

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ============================================================
// TRACKER
// ============================================================

export class PromotionTracker {
  private readonly format: NoteFormat;
  private readonly now: () => Date;
  private readonly log = logger.child({ component: 'PromotionTracker' });

  constructor(
    private readonly config: PipelineConfig,
    private readonly corpus: Corpus,
    private readonly store: RecordStore,
    options: PromotionTrackerOptions = {}
  ) {
    this.format = options.format ?? markdownFormat;
    this.now = options.now ?? (() => new Date());
  }

  async sweep(options: SweepOptions = {}): Promise<SweepResult> {
    const { tags } = this.config;
    const state: SweepState = {
      dryRun: options.dryRun ?? false,
      promoted: await listPromotedFingerprints(this.store),
      library: await this.indexLibrary(),
      result: { promotions: [], feedback: [], conflicts: [], alreadyPromoted: 0, notesScanned: 0 },
    };

    const notes = await this.corpus.listNotes(this.config.run.outputPath);

    for (const notePath of notes) {
      let text: string;
      try {
        text = await this.corpus.read(notePath);
      } catch (error) {
        this.log.warn('Skipping unreadable note', { notePath, error: errorMessage(error) });
        continue;
      }
      state.result.notesScanned++;

      const tagged = this.format.parseTaggedLines(text, [tags.keep, tags.good, tags.bad]);
      // A line can carry several tags; later resolutions must see earlier rewrites
      const current = new Map<number, string>();

      for (const line of tagged) {
        const live: TaggedLine = { ...line, text: current.get(line.lineNumber) ?? line.text };
        const after = await this.resolve(notePath, live, state);
        if (after !== null) current.set(line.lineNumber, after);
      }
    }

    const { result } = state;
    this.log.info('Promotion sweep completed', {
      dryRun: state.dryRun,
      notes: result.notesScanned,
      promotions: result.promotions.length,
      feedback: result.feedback.length,
      alreadyPromoted: result.alreadyPromoted,
      conflicts: result.conflicts.length,
    });

    return result;
  }

  /**
   * Resolve one tag. Returns the line as it now reads, or null if unchanged.
   */
  private async resolve(notePath: string, line: TaggedLine, state: SweepState): Promise<string | null> {
    const { tags } = this.config;

    if (!line.link) {
      this.log.debug('Tagged line has no link', { notePath, line: line.lineNumber + 1 });
      return null;
    }

    if (line.tag === tags.keep) {
      return this.promote(notePath, line, line.link, state);
    }

    const tag: FeedbackTag = line.tag === tags.good ? 'good' : 'bad';
    return this.note(notePath, line, line.link, tag, state);
  }

  private async promote(
    notePath: string,
    line: TaggedLine,
    link: { title: string; url: string },
    state: SweepState
  ): Promise<string | null> {
    const { tags } = this.config;
    const fingerprint = normalizeUrl(link.url);
    const newText = this.format.replaceTag(line.text, tags.keep, tags.kept);

    if (state.promoted.has(fingerprint)) {
      if (state.dryRun) {
        state.result.alreadyPromoted++;
        return newText;
      }
      const commit = await this.commitRewrite(notePath, line, newText, async () => {});
      if (!commit.ok) {
        state.result.conflicts.push(commit.conflict);
        return null;
      }
      state.result.alreadyPromoted++;
      return newText;
    }

    // Phase 1: compute
    const today = isoDate(this.now());
    const topicSlug = this.topicOf(line.text);
    const existing = state.library.get(fingerprint);
    const libraryPath =
      existing ??
      (await uniqueNotePath(this.config.run.libraryPath, slugify(link.title), p => this.corpus.exists(p)));

    const record: PromotionRecord = {
      id: nanoid(),
      fingerprint,
      topicSlug,
      promotedAt: this.now().toISOString(),
      title: link.title,
      url: link.url,
      libraryPath,
      sourceNote: notePath,
    };

    if (state.dryRun) {
      state.promoted.add(fingerprint);
      state.result.promotions.push(record);
      return newText;
    }

    if (existing === undefined) {
      const created = await this.corpus.create(
        libraryPath,
        renderLibraryNote({
          title: link.title,
          url: link.url,
          summary: summaryOf(line.text, link),
          topicSlug,
          dateFound: DATE_IN_PATH_RE.exec(notePath)?.[1] ?? '',
          dateSaved: today,
        })
      );
      if (!created) {
        const conflict = new RewriteConflictError(notePath, line.lineNumber, `could not create ${libraryPath}`);
        this.log.warn('Promotion discarded', { error: conflict.message });
        state.result.conflicts.push(conflict);
        return null;
      }
      state.library.set(fingerprint, libraryPath);
    }

    // Phase 2: commit, then finalize
    const commit = await this.commitRewrite(notePath, line, newText, () =>
      this.store.appendPromotion(record)
    );
    if (!commit.ok) {
      state.result.conflicts.push(commit.conflict);
      return null;
    }

    state.promoted.add(fingerprint);
    state.result.promotions.push(record);
    this.log.info('Promoted to library', { title: link.title, libraryPath, sourceNote: notePath });
    return newText;
  }

  private async note(
    notePath: string,
    line: TaggedLine,
    link: { title: string; url: string },
    tag: FeedbackTag,
    state: SweepState
  ): Promise<string | null> {
    const from = line.tag;
    const newText = this.format.replaceTag(line.text, from, `${from}${this.config.tags.notedSuffix}`);

    const record: FeedbackRecord = {
      id: nanoid(),
      title: link.title,
      url: link.url,
      tag,
      notedAt: this.now().toISOString(),
      sourceNote: notePath,
    };

    if (state.dryRun) {
      state.result.feedback.push(record);
      return newText;
    }

    const commit = await this.commitRewrite(notePath, line, newText, () =>
      this.store.appendFeedback(record)
    );
    if (!commit.ok) {
      state.result.conflicts.push(commit.conflict);
      return null;
    }

    state.result.feedback.push(record);
    return newText;
  }

  /**
   * Rewrite the line, then run `finalize`. If finalize throws the
   * original line is restored.
   */
  private async commitRewrite(
    notePath: string,
    line: TaggedLine,
    newText: string,
    finalize: () => Promise<void>
  ): Promise<Commit> {
    const rewritten = await this.corpus.rewriteLine(notePath, line.lineNumber, newText, line.text);
    if (!rewritten) {
      const conflict = new RewriteConflictError(notePath, line.lineNumber, 'line changed or write failed');
      this.log.warn('Tag rewrite failed; record discarded', { error: conflict.message });
      return { ok: false, conflict };
    }

    try {
      await finalize();
      return { ok: true };
    } catch (error) {
      const restored = await this.corpus.rewriteLine(notePath, line.lineNumber, line.text, newText);
      const conflict = new RewriteConflictError(
        notePath,
        line.lineNumber,
        `record store failed: ${errorMessage(error)}${restored ? '' : '; line could not be restored'}`
      );
      this.log.error('Record append failed', { error: conflict.message, restored });
      return { ok: false, conflict };
    }
  }

  /**
   * First configured topic tagged on the line.
   */
  private topicOf(text: string): string {
    const topic = this.config.topics.find(t => this.format.hasTag(text, `#${t.slug}`));
    return topic?.slug ?? 'general';
  }

  /**
   * Existing library notes by the normalized URL in their frontmatter.
   */
  private async indexLibrary(): Promise<Map<string, string>> {
    const library = new Map<string, string>();
    const notes = await this.corpus.listNotes(this.config.run.libraryPath);

    for (const notePath of notes) {
      try {
        const url = this.format.frontmatterField(await this.corpus.read(notePath), 'url');
        if (url && !library.has(normalizeUrl(url))) {
          library.set(normalizeUrl(url), notePath);
        }
      } catch (error) {
        this.log.warn('Skipping library note', { notePath, error: errorMessage(error) });
      }
    }

    return library;
  }
}

/**
 * Text after the link up to the trailing tags: `[T](u) — summary #keep #rag`.
 */
function summaryOf(text: string, link: { title: string; url: string }): string {
  const marker = `](${link.url})`;
  const at = text.indexOf(marker);
  if (at === -1) return '';
  const match = SUMMARY_RE.exec(text.slice(at + marker.length));
  return match ? match[1].trim() : '';
}
