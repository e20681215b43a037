/**
 * In-process article store for tests
 *
 * Mirrors the PostgreSQL repository's contract: unique origin URL,
 * partial updates, scraped_at never moving backwards.
 */

import { PersistenceConflictError } from '../db/errors.js';
import type {
  ArticleListQuery,
  ArticleReader,
  ArticleRepository,
  ArticleStats,
} from '../db/repository.js';
import type { ArticleChanges, ArticleRecord, NewArticleRecord } from '../types/index.js';

export class InMemoryArticleRepository implements ArticleRepository, ArticleReader {
  private readonly rows = new Map<number, ArticleRecord>();
  private nextId = 1;

  /** Counts writes, so tests can assert that a run changed nothing */
  writes = 0;

  /** Set to make the next insert/update fail with this error */
  failNextWrite: Error | null = null;

  all(): ArticleRecord[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  async findByUrl(originUrl: string): Promise<ArticleRecord | null> {
    const row = [...this.rows.values()].find((r) => r.originUrl === originUrl);
    return row ? { ...row } : null;
  }

  async insert(record: NewArticleRecord): Promise<ArticleRecord> {
    this.throwIfFailing();
    if (await this.findByUrl(record.originUrl)) {
      throw new PersistenceConflictError(record.originUrl);
    }

    const row: ArticleRecord = { ...record, id: this.nextId++ };
    this.rows.set(row.id, row);
    this.writes++;
    return { ...row };
  }

  async update(record: ArticleRecord, changes: ArticleChanges, scrapedAt: Date): Promise<ArticleRecord> {
    this.throwIfFailing();
    const row = this.rows.get(record.id);
    if (!row) {
      throw new Error(`Article ${record.id} no longer exists`);
    }

    const updated: ArticleRecord = {
      ...row,
      ...changes,
      scrapedAt: scrapedAt > row.scrapedAt ? scrapedAt : row.scrapedAt,
    };
    this.rows.set(row.id, updated);
    this.writes++;
    return { ...updated };
  }

  async list({ category, limit, offset }: ArticleListQuery): Promise<ArticleRecord[]> {
    return this.sorted()
      .filter((row) => !category || row.category === category)
      .slice(offset, offset + limit);
  }

  async getById(id: number): Promise<ArticleRecord | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async getStats(): Promise<ArticleStats> {
    const latest = this.sorted()[0] ?? null;
    return {
      articlesCount: this.rows.size,
      lastScrapedAt: latest?.scrapedAt ?? null,
      lastOriginUrl: latest?.originUrl ?? null,
    };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  private sorted(): ArticleRecord[] {
    return this.all().sort(
      (a, b) => b.scrapedAt.getTime() - a.scrapedAt.getTime() || b.id - a.id
    );
  }

  private throwIfFailing(): void {
    const error = this.failNextWrite;
    if (error) {
      this.failNextWrite = null;
      throw error;
    }
  }
}
