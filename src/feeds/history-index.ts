/**
 * Scanline — History Index
 *
 * Everything already written to the vault, as a set of normalized URLs
 * and titles. Rebuilt from the corpus on every run: the notes are the
 * source of truth and nothing else is persisted.
 */

import type { Fingerprint, PipelineConfig } from '../types';
import type { Corpus, NoteFormat } from '../corpus';
import { markdownFormat } from '../corpus';
import { CorpusUnavailableError, isScanlineError } from '../lib/errors';
import { mapWithConcurrency } from '../lib/concurrency';
import { isMatchableTitle, normalizeTitle, normalizeUrl, titleOverlap } from '../lib/fingerprint';
import { errorMessage, logger } from '../lib/logger';

const READ_CONCURRENCY = 8;

// ============================================================
// FINGERPRINT SET
// ============================================================

export interface FingerprintMatch {
  matchedOn: 'url' | 'title';
  key: string;
  /** Where the matching fingerprint was first seen */
  origin: string;
}

/**
 * Set of URL and title keys with first-seen provenance.
 * Two fingerprints match when either component matches.
 */
export class FingerprintSet {
  private readonly urls = new Map<string, string>();
  private readonly titles = new Map<string, string>();

  /**
   * @param titleSimilarity - word-overlap ratio for fuzzy title matches; 1 means exact only
   */
  constructor(private readonly titleSimilarity: number = 1) {}

  addUrl(url: string, origin: string): void {
    if (url && !this.urls.has(url)) {
      this.urls.set(url, origin);
    }
  }

  addTitle(title: string, origin: string): void {
    if (isMatchableTitle(title) && !this.titles.has(title)) {
      this.titles.set(title, origin);
    }
  }

  add(fingerprint: Fingerprint, origin: string): void {
    this.addUrl(fingerprint.url, origin);
    this.addTitle(fingerprint.title, origin);
  }

  lookup(fingerprint: Fingerprint): FingerprintMatch | null {
    const urlOrigin = this.urls.get(fingerprint.url);
    if (urlOrigin !== undefined) {
      return { matchedOn: 'url', key: fingerprint.url, origin: urlOrigin };
    }

    if (!isMatchableTitle(fingerprint.title)) return null;

    const titleOrigin = this.titles.get(fingerprint.title);
    if (titleOrigin !== undefined) {
      return { matchedOn: 'title', key: fingerprint.title, origin: titleOrigin };
    }

    if (this.titleSimilarity < 1 && fingerprint.title.split(' ').length >= 3) {
      for (const [title, origin] of this.titles) {
        if (titleOverlap(fingerprint.title, title) >= this.titleSimilarity) {
          return { matchedOn: 'title', key: title, origin };
        }
      }
    }

    return null;
  }

  has(fingerprint: Fingerprint): boolean {
    return this.lookup(fingerprint) !== null;
  }

  get urlCount(): number {
    return this.urls.size;
  }

  get titleCount(): number {
    return this.titles.size;
  }

  /** Provenance keyed `url:<key>` / `title:<key>`, in insertion order */
  provenance(): Map<string, string> {
    const result = new Map<string, string>();
    for (const [url, origin] of this.urls) result.set(`url:${url}`, origin);
    for (const [title, origin] of this.titles) result.set(`title:${title}`, origin);
    return result;
  }
}

// ============================================================
// HISTORY INDEX
// ============================================================

export class HistoryIndex extends FingerprintSet {
  notesScanned = 0;
  readonly skippedNotes: string[] = [];
}

export interface HistoryIndexOptions {
  folders: readonly string[];
  titleSimilarity?: number;
  format?: NoteFormat;
  /** Titles never indexed, such as the headings the daily note renderer writes */
  ignoreTitles?: readonly string[];
}

/**
 * Folders that hold previously written output.
 */
export function historyFolders(config: PipelineConfig): string[] {
  return [...new Set([config.run.outputPath, config.run.libraryPath, ...config.run.historyFolders])];
}

/**
 * Build the index by scanning every note in the given folders.
 * Unreadable notes are skipped; an unreachable corpus aborts.
 */
export async function buildHistoryIndex(
  corpus: Corpus,
  options: HistoryIndexOptions
): Promise<HistoryIndex> {
  const format = options.format ?? markdownFormat;
  const index = new HistoryIndex(options.titleSimilarity ?? 1);
  const ignored = new Set((options.ignoreTitles ?? []).map(normalizeTitle));

  const paths = new Set<string>();
  for (const folder of options.folders) {
    let notes: string[];
    try {
      notes = await corpus.listNotes(folder);
    } catch (error) {
      if (isScanlineError(error)) throw error;
      throw new CorpusUnavailableError(`${corpus.location}/${folder}`, { cause: error });
    }
    notes.forEach(p => paths.add(p));
  }

  const sorted = [...paths].sort();
  const texts = await mapWithConcurrency(sorted, READ_CONCURRENCY, async notePath => {
    try {
      return await corpus.read(notePath);
    } catch (error) {
      logger.warn('Skipping unreadable note', { notePath, error: errorMessage(error) });
      return null;
    }
  });

  sorted.forEach((notePath, i) => {
    const text = texts[i];
    if (text === null) {
      index.skippedNotes.push(notePath);
      return;
    }

    try {
      format.validate(text);
      const links = format.extractLinks(text);
      const titles = format.extractTitles(text);
      links.forEach(url => index.addUrl(normalizeUrl(url), notePath));
      titles
        .map(normalizeTitle)
        .filter(title => !ignored.has(title))
        .forEach(title => index.addTitle(title, notePath));
      index.notesScanned++;
    } catch (error) {
      logger.warn('Skipping malformed note', { notePath, error: errorMessage(error) });
      index.skippedNotes.push(notePath);
    }
  });

  logger.info('History index built', {
    notes: index.notesScanned,
    skipped: index.skippedNotes.length,
    urls: index.urlCount,
    titles: index.titleCount,
  });

  return index;
}
