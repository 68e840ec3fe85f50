/**
 * Scanline — Fingerprints
 *
 * URL and title normalization shared by the history index, the
 * cross-run deduplicator and the promotion tracker.
 */

import type { Fingerprint } from '../types';

/** Titles this short ("Summary", "Links") are too generic to match on. */
export const MIN_TITLE_CHARS = 11;

const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'dclid',
  'igshid',
  'mc_cid',
  'mc_eid',
  'ref',
  'ref_src',
  'ref_url',
  'si',
]);

/** Share-sheet params X appends to status links */
const X_SHARE_PARAMS = new Set(['s', 't']);

const X_HOSTS = new Set(['x.com', 'twitter.com', 'mobile.twitter.com', 'mobile.x.com']);

/**
 * Normalize a URL for comparison.
 * Drops scheme, `www.`, fragment, tracking params and trailing slash.
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return url.trim().toLowerCase();
  }

  let host = parsed.hostname.toLowerCase().replace(/^www\./, '');
  const isX = X_HOSTS.has(host);
  if (isX) host = 'x.com';

  const params = new URLSearchParams();
  for (const [key, value] of parsed.searchParams) {
    const lower = key.toLowerCase();
    if (lower.startsWith('utm_') || TRACKING_PARAMS.has(lower)) continue;
    if (isX && X_SHARE_PARAMS.has(lower)) continue;
    params.append(key, value);
  }
  params.sort();

  const port = parsed.port ? `:${parsed.port}` : '';
  const path = parsed.pathname.replace(/\/+$/, '');
  const query = params.toString();

  return `${host}${port}${path}${query ? `?${query}` : ''}`.toLowerCase();
}

export function normalizeTitle(title: string): string {
  return title.replace(/\s+/g, ' ').trim().toLowerCase();
}

export function fingerprintOf(item: { url: string; title: string }): Fingerprint {
  return {
    url: normalizeUrl(item.url),
    title: normalizeTitle(item.title),
  };
}

/**
 * Whether a normalized title is long enough to take part in matching.
 */
export function isMatchableTitle(title: string): boolean {
  return title.length >= MIN_TITLE_CHARS;
}

/**
 * Word overlap between two normalized titles, relative to the longer one.
 */
export function titleOverlap(a: string, b: string): number {
  const wordsA = new Set(a.split(' ').filter(Boolean));
  const wordsB = new Set(b.split(' ').filter(Boolean));
  if (wordsA.size === 0 || wordsB.size === 0) return 0;

  let shared = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) shared++;
  }

  return shared / Math.max(wordsA.size, wordsB.size);
}

/**
 * Host of a URL without `www.`, or null when the URL does not parse.
 */
export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return null;
  }
}

/**
 * True when `host` is `domain` or one of its subdomains.
 */
export function hostMatches(host: string, domain: string): boolean {
  const d = domain.toLowerCase().replace(/^www\./, '');
  return host === d || host.endsWith(`.${d}`);
}
