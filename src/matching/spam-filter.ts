/**
 * Scanline — Spam Filter
 *
 * Deterministic heuristics for misleading or engagement-bait items,
 * run before scoring. Each family votes independently; one spam vote
 * is enough to drop the item.
 *
 * Families:
 * - claim/link mismatch: the title claims an official source, the link goes elsewhere
 * - low effort: no body, no engagement data, clickbait title
 *
 * Priority and lab accounts are never checked.
 */

import type { ContentItem, QualityFilters } from '../types';
import { hostMatches, hostOf } from '../lib/fingerprint';

export type SpamFamily = 'claim-link-mismatch' | 'low-effort';

export interface SpamVerdict {
  isSpam: boolean;
  family?: SpamFamily;
  reason?: string;
}

interface SpamDetector {
  family: SpamFamily;
  /** Returns a reason when the item looks like spam */
  vote(item: ContentItem): string | null;
}

// ============================================================
// DETECTORS
// ============================================================

function claimLinkMismatchDetector(filters: QualityFilters): SpamDetector {
  const rules = filters.spamDetection.claimLinkMismatch.rules.map(rule => ({
    name: rule.name,
    claim: new RegExp(rule.claimPattern, 'i'),
    trustedDomains: rule.trustedDomains,
  }));

  return {
    family: 'claim-link-mismatch',
    vote(item) {
      for (const rule of rules) {
        if (!rule.claim.test(item.title)) continue;

        const host = hostOf(item.url);
        if (host === null) {
          return `${rule.name} claim with an unparseable link`;
        }
        if (!rule.trustedDomains.some(domain => hostMatches(host, domain))) {
          return `${rule.name} claim links to ${host}`;
        }
      }
      return null;
    },
  };
}

function hasAnyEngagement(item: ContentItem): boolean {
  return Object.values(item.engagement).some(value => value !== undefined);
}

function lowEffortDetector(filters: QualityFilters): SpamDetector {
  const { bodyLengthFloor, patterns } = filters.spamDetection.lowEffort;
  const templates = patterns.map(p => new RegExp(p, 'i'));

  return {
    family: 'low-effort',
    vote(item) {
      if (item.bodyLength >= bodyLengthFloor) return null;
      if (hasAnyEngagement(item)) return null;

      const template = templates.find(re => re.test(item.title));
      return template ? `low-effort title matching ${template.source}` : null;
    },
  };
}

// ============================================================
// FILTER
// ============================================================

export class SpamFilter {
  private readonly enabled: boolean;
  private readonly detectors: SpamDetector[] = [];

  constructor(filters: QualityFilters) {
    const spam = filters.spamDetection;
    this.enabled = spam.enabled;

    if (spam.claimLinkMismatch.enabled) {
      this.detectors.push(claimLinkMismatchDetector(filters));
    }
    if (spam.lowEffort.enabled) {
      this.detectors.push(lowEffortDetector(filters));
    }
  }

  classify(item: ContentItem): SpamVerdict {
    if (!this.enabled) return { isSpam: false };
    if (item.isPriorityAccount || item.isLabAccount) return { isSpam: false };

    for (const detector of this.detectors) {
      const reason = detector.vote(item);
      if (reason !== null) {
        return { isSpam: true, family: detector.family, reason };
      }
    }

    return { isSpam: false };
  }

  /**
   * Copy of the item carrying the verdict.
   */
  check(item: ContentItem): ContentItem {
    const verdict = this.classify(item);
    return Object.freeze({
      ...item,
      spamFlag: verdict.isSpam,
      spamReason: verdict.reason,
    });
  }
}
