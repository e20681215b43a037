/**
 * Persist reconciliation decisions, one item at a time
 */

import { PersistenceConflictError, PersistenceError } from '../db/errors.js';
import type { ArticleRepository } from '../db/repository.js';
import { logger } from '../utils/logger.js';
import type { ReconcileDecision } from './engine.js';

export type CommitOutcome = 'inserted' | 'updated' | 'unchanged';

/**
 * A lost insert race counts as "already present".
 * @throws PersistenceError for any other failed write
 */
export async function commitDecision(
  repository: ArticleRepository,
  decision: ReconcileDecision
): Promise<CommitOutcome> {
  switch (decision.type) {
    case 'noop':
      return 'unchanged';

    case 'insert': {
      const { originUrl } = decision.record;
      try {
        await repository.insert(decision.record);
        return 'inserted';
      } catch (error) {
        if (error instanceof PersistenceConflictError) {
          logger.debug({ originUrl }, 'Article inserted concurrently, treating as present');
          return 'unchanged';
        }
        throw asPersistenceError(error, originUrl, 'insert');
      }
    }

    case 'update': {
      const { originUrl } = decision.record;
      try {
        await repository.update(decision.record, decision.changes, decision.scrapedAt);
        return 'updated';
      } catch (error) {
        throw asPersistenceError(error, originUrl, 'update');
      }
    }
  }
}

function asPersistenceError(
  error: unknown,
  originUrl: string,
  operation: 'insert' | 'update'
): PersistenceError {
  return error instanceof PersistenceError
    ? error
    : new PersistenceError(originUrl, operation, { cause: error });
}
