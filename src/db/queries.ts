/**
 * Database Queries and Operations
 */

import { query, queryOne, pingDatabase } from './index.js';
import { PersistenceConflictError } from './errors.js';
import { UNIQUE_VIOLATION } from './schema.js';
import type {
  ArticleListQuery,
  ArticleReader,
  ArticleRepository,
  ArticleStats,
} from './repository.js';
import type { ArticleChanges, ArticleRecord, NewArticleRecord } from '../types/index.js';

/** Updatable fields and their columns */
const UPDATABLE_COLUMNS = [
  ['category', 'category'],
  ['title', 'title'],
  ['metaText', 'meta_text'],
  ['imageUrl', 'image_url'],
  ['contentText', 'content_text'],
] as const satisfies ReadonlyArray<readonly [keyof ArticleChanges, string]>;

// ═══════════════════════════════════════════════════════════════════════════════
// Article Operations
// ═══════════════════════════════════════════════════════════════════════════════

export class PgArticleRepository implements ArticleRepository, ArticleReader {
  async findByUrl(originUrl: string): Promise<ArticleRecord | null> {
    const row = await queryOne<ArticleRow>(
      'SELECT * FROM articles WHERE origin_url = $1 LIMIT 1',
      [originUrl]
    );
    return row ? mapArticleRow(row) : null;
  }

  async insert(record: NewArticleRecord): Promise<ArticleRecord> {
    try {
      const row = await queryOne<ArticleRow>(
        `
        INSERT INTO articles (category, origin_url, title, meta_text, image_url, content_text, scraped_at)
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        RETURNING *
      `,
        [
          record.category,
          record.originUrl,
          record.title,
          record.metaText,
          record.imageUrl,
          record.contentText,
          record.scrapedAt,
        ]
      );
      if (!row) {
        throw new Error(`Insert returned no row for ${record.originUrl}`);
      }
      return mapArticleRow(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new PersistenceConflictError(record.originUrl, { cause: error });
      }
      throw error;
    }
  }

  async update(record: ArticleRecord, changes: ArticleChanges, scrapedAt: Date): Promise<ArticleRecord> {
    const assignments: string[] = [];
    const params: unknown[] = [];

    for (const [field, column] of UPDATABLE_COLUMNS) {
      const value = changes[field];
      if (value !== undefined) {
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    params.push(scrapedAt);
    assignments.push(`scraped_at = GREATEST(scraped_at, $${params.length})`);
    params.push(record.id);

    const row = await queryOne<ArticleRow>(
      `UPDATE articles SET ${assignments.join(', ')} WHERE id = $${params.length} RETURNING *`,
      params
    );
    if (!row) {
      throw new Error(`Article ${record.id} (${record.originUrl}) no longer exists`);
    }
    return mapArticleRow(row);
  }

  async list({ category, limit, offset }: ArticleListQuery): Promise<ArticleRecord[]> {
    const rows = category
      ? await query<ArticleRow>(
          `
          SELECT * FROM articles
          WHERE category = $1
          ORDER BY scraped_at DESC, id DESC
          LIMIT $2 OFFSET $3
        `,
          [category, limit, offset]
        )
      : await query<ArticleRow>(
          `
          SELECT * FROM articles
          ORDER BY scraped_at DESC, id DESC
          LIMIT $1 OFFSET $2
        `,
          [limit, offset]
        );
    return rows.map(mapArticleRow);
  }

  async getById(id: number): Promise<ArticleRecord | null> {
    const row = await queryOne<ArticleRow>('SELECT * FROM articles WHERE id = $1 LIMIT 1', [id]);
    return row ? mapArticleRow(row) : null;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Statistics
  // ═══════════════════════════════════════════════════════════════════════════

  async getStats(): Promise<ArticleStats> {
    const counts = await queryOne<{ count: string; last: Date | null }>(
      'SELECT COUNT(*) AS count, MAX(scraped_at) AS last FROM articles'
    );
    const latest = await queryOne<{ origin_url: string }>(
      'SELECT origin_url FROM articles ORDER BY scraped_at DESC, id DESC LIMIT 1'
    );

    return {
      // COUNT(*) is a bigint, which pg returns as a string
      articlesCount: Number(counts?.count ?? 0),
      lastScrapedAt: counts?.last ?? null,
      lastOriginUrl: latest?.origin_url ?? null,
    };
  }

  ping(): Promise<boolean> {
    return pingDatabase();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helper Functions
// ═══════════════════════════════════════════════════════════════════════════════

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION
  );
}

// Row types for database results
type ArticleRow = {
  id: number;
  category: string;
  origin_url: string;
  title: string;
  meta_text: string | null;
  image_url: string | null;
  content_text: string;
  scraped_at: Date;
};

// Mappers
function mapArticleRow(row: ArticleRow): ArticleRecord {
  return {
    id: row.id,
    originUrl: row.origin_url,
    category: row.category,
    title: row.title,
    metaText: row.meta_text,
    imageUrl: row.image_url,
    contentText: row.content_text,
    scrapedAt: row.scraped_at,
  };
}
