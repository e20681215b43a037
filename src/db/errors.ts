/**
 * Persistence errors
 */

/**
 * Insert lost a race: a record with the same origin URL already exists
 */
export class PersistenceConflictError extends Error {
  readonly kind = 'persistence_conflict' as const;
  readonly originUrl: string;

  constructor(originUrl: string, options?: ErrorOptions) {
    super(`Article already exists: ${originUrl}`, options);
    this.name = 'PersistenceConflictError';
    this.originUrl = originUrl;
  }
}

export class PersistenceError extends Error {
  readonly kind = 'persistence' as const;
  readonly originUrl: string;
  readonly operation: 'insert' | 'update';

  constructor(originUrl: string, operation: 'insert' | 'update', options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to ${operation} article ${originUrl}${reason}`, options);
    this.name = 'PersistenceError';
    this.originUrl = originUrl;
    this.operation = operation;
  }
}
