/**
 * Exponential backoff retry utility
 */

import type { RetryConfig } from '../types/index.js';
import { logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  factor: 2,
};

export interface RetryOptions extends Partial<RetryConfig> {
  /** Waits between attempts; replaced in tests */
  sleep?: (ms: number) => Promise<void>;
  /** Extra fields attached to the retry log lines */
  context?: Record<string, unknown>;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { sleep: wait = sleep, context = {}, ...overrides } = options;
  const { maxAttempts, initialDelayMs, maxDelayMs, factor } = {
    ...DEFAULT_RETRY_CONFIG,
    ...overrides,
  };

  let lastError: Error | undefined;
  let delay = Math.min(initialDelayMs, maxDelayMs);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts) {
        logger.error({ ...context, error: lastError, attempt, maxAttempts }, 'All retry attempts exhausted');
        throw lastError;
      }

      logger.warn(
        { ...context, error: lastError.message, attempt, maxAttempts, nextDelayMs: delay },
        'Retry attempt failed, waiting before next attempt'
      );

      await wait(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { sleep };
