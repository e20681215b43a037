/**
 * Minimum-gap rate limiter
 *
 * Keeps at least `minIntervalMs` between the end of one call and the start
 * of the next, whether the previous call succeeded or failed.
 */

import { sleep } from './retry.js';

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RateLimiter {
  private lastCallEnd: number | null = null;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(minIntervalMs: number, options: RateLimiterOptions = {}) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  async waitForSlot(): Promise<void> {
    if (this.lastCallEnd === null) {
      return;
    }

    const timeSinceLastCall = this.now() - this.lastCallEnd;
    const waitTime = Math.max(0, this.minIntervalMs - timeSinceLastCall);

    if (waitTime > 0) {
      await this.sleep(waitTime);
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    try {
      return await fn();
    } finally {
      this.lastCallEnd = this.now();
    }
  }
}
