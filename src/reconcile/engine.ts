/**
 * Reconciliation engine
 *
 * Decides what a freshly scraped item means for the stored record with
 * the same origin URL: insert it, fill/improve some fields, or nothing.
 * Fields are only ever filled when empty or replaced by something
 * strictly better; a re-scrape never makes a record worse.
 */

import { isBlank } from '../utils/text.js';
import type {
  ArticleChanges,
  ArticleRecord,
  NewArticleRecord,
  ScrapedItem,
} from '../types/index.js';

/** New body text must be this much longer to replace the stored one */
export const CONTENT_REPLACE_MARGIN = 80;

/**
 * Asset paths the site uses for full-size editorial images. Banners and
 * icons live elsewhere.
 */
const HIGH_QUALITY_IMAGE_PATHS = ['/upload/', '/uploads/', '/gallery/', '/galeria/'];

export type ReconcileDecision =
  | { type: 'insert'; record: NewArticleRecord }
  | { type: 'update'; record: ArticleRecord; changes: ArticleChanges; scrapedAt: Date }
  | { type: 'noop' };

export interface ReconcileOptions {
  contentReplaceMargin?: number;
}

export function isHighQualityImage(url: string | null | undefined): boolean {
  if (isBlank(url)) {
    return false;
  }
  const lower = (url ?? '').toLowerCase();
  return HIGH_QUALITY_IMAGE_PATHS.some((path) => lower.includes(path));
}

export function shouldReplaceImage(existing: string | null, incoming: string | null): boolean {
  if (isBlank(incoming)) {
    return false;
  }
  if (isBlank(existing)) {
    return true;
  }
  // Only a differing high-quality image may replace a stored one, so a
  // high-quality image is never swapped for a banner.
  return incoming !== existing && isHighQualityImage(incoming);
}

export function shouldReplaceText(
  existing: string | null,
  incoming: string | null,
  margin: number = CONTENT_REPLACE_MARGIN
): boolean {
  if (isBlank(incoming)) {
    return false;
  }
  if (isBlank(existing)) {
    return true;
  }
  return (incoming ?? '').length > (existing ?? '').length + margin;
}

function fillIfEmpty(existing: string | null, incoming: string | null): boolean {
  return isBlank(existing) && !isBlank(incoming);
}

export function reconcile(
  existing: ArticleRecord | null,
  item: ScrapedItem,
  now: Date,
  options: ReconcileOptions = {}
): ReconcileDecision {
  if (!existing) {
    return {
      type: 'insert',
      record: {
        originUrl: item.originUrl,
        category: item.category,
        title: item.title,
        metaText: isBlank(item.metaText) ? null : item.metaText,
        imageUrl: isBlank(item.imageUrl) ? null : item.imageUrl,
        contentText: item.contentText,
        scrapedAt: now,
      },
    };
  }

  const changes: ArticleChanges = {};

  if (fillIfEmpty(existing.category, item.category)) {
    changes.category = item.category;
  }
  if (fillIfEmpty(existing.title, item.title)) {
    changes.title = item.title;
  }
  if (item.metaText !== null && fillIfEmpty(existing.metaText, item.metaText)) {
    changes.metaText = item.metaText;
  }
  if (item.imageUrl !== null && shouldReplaceImage(existing.imageUrl, item.imageUrl)) {
    changes.imageUrl = item.imageUrl;
  }
  if (shouldReplaceText(existing.contentText, item.contentText, options.contentReplaceMargin)) {
    changes.contentText = item.contentText;
  }

  if (Object.keys(changes).length === 0) {
    return { type: 'noop' };
  }

  return { type: 'update', record: existing, changes, scrapedAt: now };
}
