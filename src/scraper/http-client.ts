/**
 * Polite HTTP client
 *
 * Plain GET over undici with a fixed browser-like identity, a per-request
 * timeout, exponential backoff retries and a minimum gap between requests.
 * The target site blocks clients that hammer it, so every request goes
 * through the same rate limiter, retries included.
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { FetchError } from './errors.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { withRetry, sleep as defaultSleep } from '../utils/retry.js';
import { logger } from '../utils/logger.js';
import type { RetryConfig } from '../types/index.js';

/**
 * Anything that can turn a URL into page markup
 */
export interface PageFetcher {
  fetch(url: string): Promise<string>;
}

export interface PoliteHttpClientOptions {
  userAgent: string;
  timeoutMs: number;
  /** Minimum gap between the end of a request and the start of the next */
  delayMs: number;
  retry?: Partial<RetryConfig>;
  acceptLanguage?: string;
  /** Connection pool to use instead of the client's own undici Agent */
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
const DEFAULT_ACCEPT_LANGUAGE = 'sk-SK,sk;q=0.9,en;q=0.8';

export class PoliteHttpClient implements PageFetcher {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly retry: Partial<RetryConfig>;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly limiter: RateLimiter;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: PoliteHttpClientOptions) {
    this.headers = {
      'User-Agent': options.userAgent,
      Accept: ACCEPT,
      'Accept-Language': options.acceptLanguage ?? DEFAULT_ACCEPT_LANGUAGE,
    };
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry ?? {};
    this.sleep = options.sleep ?? defaultSleep;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ?? new Agent({ keepAliveTimeout: 30_000, connections: 1 });
    this.limiter = new RateLimiter(options.delayMs, {
      now: options.now,
      sleep: this.sleep,
    });
  }

  /**
   * GET a page and return its body, retrying transient failures
   * @throws FetchError once all attempts failed
   */
  async fetch(url: string): Promise<string> {
    return withRetry(() => this.limiter.execute(() => this.request(url)), {
      ...this.retry,
      sleep: this.sleep,
      context: { url },
    });
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async request(url: string): Promise<string> {
    const startedAt = Date.now();

    try {
      const response = await fetch(url, {
        headers: this.headers,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (response.status >= 400) {
        await response.body?.cancel();
        throw new FetchError(url, `HTTP ${response.status} for ${url}`, {
          status: response.status,
        });
      }

      const body = await response.text();
      logger.debug(
        { url, status: response.status, bytes: body.length, elapsedMs: Date.now() - startedAt },
        'Fetched page'
      );
      return body;
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(url, `Request failed for ${url}: ${reason}`, { cause: error });
    }
  }
}
