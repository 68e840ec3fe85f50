/**
 * Scanline — Content Classifier
 *
 * First match wins:
 *   lab-pulse  posts from model labs and their lead developers
 *   deep-dive  long-form threads and article links
 *   general    everything else
 */

import type { ClassifiedItem, ContentCategory, ContentItem, QualityFilters, ScoredItem } from '../types';
import { isLongForm } from './scorer';

export function classifyItem(item: ContentItem, filters: QualityFilters): ContentCategory {
  if (item.isLabAccount) return 'lab-pulse';
  if (isLongForm(item, filters)) return 'deep-dive';
  return 'general';
}

export class Classifier {
  constructor(private readonly filters: QualityFilters) {}

  classify(item: ContentItem): ContentCategory {
    return classifyItem(item, this.filters);
  }

  decorate(item: ScoredItem): ClassifiedItem {
    return Object.freeze({ ...item, category: this.classify(item) });
  }
}
