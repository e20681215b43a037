/**
 * Core types for the hockey news scraper
 */

export const CATEGORIES = ['extraliga', 'reprezentacia'] as const;

export type Category = (typeof CATEGORIES)[number];

export interface CategoryListing {
  category: Category;
  listingUrl: string;
}

/**
 * Stored article, keyed by its canonical detail page URL
 */
export interface ArticleRecord {
  id: number;
  originUrl: string;
  category: string;
  title: string;
  metaText: string | null;
  imageUrl: string | null;
  contentText: string;
  scrapedAt: Date;
}

export type NewArticleRecord = Omit<ArticleRecord, 'id'>;

/**
 * Fields the reconciliation step may change on an existing record
 */
export type ArticleChanges = Partial<
  Pick<ArticleRecord, 'category' | 'title' | 'metaText' | 'imageUrl' | 'contentText'>
>;

/**
 * Article extracted from a detail page during a run
 */
export interface ScrapedItem {
  originUrl: string;
  category: Category;
  title: string;
  metaText: string | null;
  imageUrl: string | null;
  contentText: string;
}

/**
 * Article link found on a category listing page
 */
export interface ListingCandidate {
  originUrl: string;
  /** Thumbnail from the listing tile, used when the detail page has no image */
  imageUrl: string | null;
}

export interface RunSummary {
  scanned: number;
  inserted: number;
  updated: number;
  unchanged: number;
  skipped: number;
  errors: number;
  durationMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
