import { beforeEach, describe, it, expect, vi } from 'vitest';

vi.mock('./index.js', () => ({
  query: vi.fn(),
  queryOne: vi.fn(),
  pingDatabase: vi.fn(),
}));

import { query, queryOne } from './index.js';
import { PgArticleRepository } from './queries.js';
import { PersistenceConflictError } from './errors.js';
import type { ArticleRecord } from '../types/index.js';

const queryMock = vi.mocked(query);
const queryOneMock = vi.mocked(queryOne);

const SCRAPED_AT = new Date('2026-10-19T08:00:00Z');

const ROW = {
  id: 7,
  category: 'extraliga',
  origin_url: 'https://www.hockeyslovakia.sk/sk/article/slovan-vyhral-derby',
  title: 'Slovan vyhral derby',
  meta_text: null,
  image_url: 'https://www.hockeyslovakia.sk/upload/gallery/derby.jpg',
  content_text: 'Telo článku',
  scraped_at: SCRAPED_AT,
};

const RECORD: ArticleRecord = {
  id: 7,
  originUrl: ROW.origin_url,
  category: 'extraliga',
  title: 'Slovan vyhral derby',
  metaText: null,
  imageUrl: ROW.image_url,
  contentText: 'Telo článku',
  scrapedAt: SCRAPED_AT,
};

describe('PgArticleRepository', () => {
  const repository = new PgArticleRepository();

  beforeEach(() => {
    queryMock.mockReset();
    queryOneMock.mockReset();
  });

  it('maps rows to records', async () => {
    queryOneMock.mockResolvedValueOnce(ROW);

    await expect(repository.findByUrl(ROW.origin_url)).resolves.toEqual(RECORD);
    expect(queryOneMock).toHaveBeenCalledWith('SELECT * FROM articles WHERE origin_url = $1 LIMIT 1', [
      ROW.origin_url,
    ]);
  });

  it('updates only the changed columns and never moves scraped_at back', async () => {
    queryOneMock.mockResolvedValueOnce(ROW);

    await repository.update(RECORD, { imageUrl: ROW.image_url, contentText: 'Telo článku' }, SCRAPED_AT);

    expect(queryOneMock).toHaveBeenCalledWith(
      'UPDATE articles SET image_url = $1, content_text = $2, scraped_at = GREATEST(scraped_at, $3) WHERE id = $4 RETURNING *',
      [ROW.image_url, 'Telo článku', SCRAPED_AT, 7]
    );
  });

  it('reports a duplicate origin URL as a conflict', async () => {
    queryOneMock.mockRejectedValueOnce(Object.assign(new Error('duplicate key value'), { code: '23505' }));

    const { id: _id, ...record } = RECORD;
    await expect(repository.insert(record)).rejects.toBeInstanceOf(PersistenceConflictError);
  });

  it('passes other insert failures through', async () => {
    queryOneMock.mockRejectedValueOnce(new Error('connection terminated'));

    const { id: _id, ...record } = RECORD;
    await expect(repository.insert(record)).rejects.toThrow('connection terminated');
  });

  it('filters the list by category', async () => {
    queryMock.mockResolvedValueOnce([ROW]);

    await expect(repository.list({ category: 'extraliga', limit: 5, offset: 10 })).resolves.toEqual([RECORD]);
    expect(queryMock.mock.calls[0]?.[1]).toEqual(['extraliga', 5, 10]);
  });

  it('reads the bigint count as a number', async () => {
    queryOneMock
      .mockResolvedValueOnce({ count: '42', last: SCRAPED_AT })
      .mockResolvedValueOnce({ origin_url: ROW.origin_url });

    await expect(repository.getStats()).resolves.toEqual({
      articlesCount: 42,
      lastScrapedAt: SCRAPED_AT,
      lastOriginUrl: ROW.origin_url,
    });
  });

  it('reports an empty table', async () => {
    queryOneMock.mockResolvedValueOnce({ count: '0', last: null }).mockResolvedValueOnce(null);

    await expect(repository.getStats()).resolves.toEqual({
      articlesCount: 0,
      lastScrapedAt: null,
      lastOriginUrl: null,
    });
  });
});
