/**
 * Storage contracts used by the pipeline and the read-only API
 */

import type { ArticleChanges, ArticleRecord, NewArticleRecord } from '../types/index.js';

export interface ArticleRepository {
  findByUrl(originUrl: string): Promise<ArticleRecord | null>;
  /**
   * @throws PersistenceConflictError when the origin URL is already stored
   */
  insert(record: NewArticleRecord): Promise<ArticleRecord>;
  /**
   * Apply a partial update. `scrapedAt` never moves a record backwards.
   */
  update(record: ArticleRecord, changes: ArticleChanges, scrapedAt: Date): Promise<ArticleRecord>;
}

export interface ArticleListQuery {
  category?: string;
  limit: number;
  offset: number;
}

export interface ArticleStats {
  articlesCount: number;
  lastScrapedAt: Date | null;
  lastOriginUrl: string | null;
}

export interface ArticleReader {
  /** Newest first: scraped_at DESC, id DESC */
  list(query: ArticleListQuery): Promise<ArticleRecord[]>;
  getById(id: number): Promise<ArticleRecord | null>;
  getStats(): Promise<ArticleStats>;
  ping(): Promise<boolean>;
}
