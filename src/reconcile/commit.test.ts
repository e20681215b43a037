import { beforeEach, describe, it, expect } from 'vitest';
import { commitDecision } from './commit.js';
import { PersistenceError } from '../db/errors.js';
import { InMemoryArticleRepository } from '../testing/in-memory-repository.js';
import type { NewArticleRecord } from '../types/index.js';

const NOW = new Date('2026-10-19T08:00:00Z');

const RECORD: NewArticleRecord = {
  originUrl: 'https://www.hockeyslovakia.sk/sk/article/slovan-vyhral-derby',
  category: 'extraliga',
  title: 'Slovan vyhral derby',
  metaText: null,
  imageUrl: null,
  contentText: 'Telo článku',
  scrapedAt: new Date('2026-10-18T08:00:00Z'),
};

describe('commitDecision', () => {
  let repository: InMemoryArticleRepository;

  beforeEach(() => {
    repository = new InMemoryArticleRepository();
  });

  it('writes nothing for a no-op', async () => {
    await expect(commitDecision(repository, { type: 'noop' })).resolves.toBe('unchanged');
    expect(repository.writes).toBe(0);
  });

  it('inserts new records', async () => {
    await expect(commitDecision(repository, { type: 'insert', record: RECORD })).resolves.toBe('inserted');
    expect(repository.all()).toEqual([{ ...RECORD, id: 1 }]);
  });

  it('treats a lost insert race as already present', async () => {
    await repository.insert(RECORD);

    await expect(commitDecision(repository, { type: 'insert', record: RECORD })).resolves.toBe('unchanged');
    expect(repository.all()).toHaveLength(1);
  });

  it('applies updates and advances scraped_at', async () => {
    const existing = await repository.insert(RECORD);

    const outcome = await commitDecision(repository, {
      type: 'update',
      record: existing,
      changes: { imageUrl: 'https://www.hockeyslovakia.sk/upload/a.jpg' },
      scrapedAt: NOW,
    });

    expect(outcome).toBe('updated');
    expect(await repository.getById(existing.id)).toMatchObject({
      imageUrl: 'https://www.hockeyslovakia.sk/upload/a.jpg',
      contentText: 'Telo článku',
      scrapedAt: NOW,
    });
  });

  it('wraps other write failures', async () => {
    repository.failNextWrite = new Error('disk full');

    const error = await commitDecision(repository, { type: 'insert', record: RECORD }).catch(
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({
      operation: 'insert',
      originUrl: RECORD.originUrl,
      message: `Failed to insert article ${RECORD.originUrl}: disk full`,
    });
  });
});
