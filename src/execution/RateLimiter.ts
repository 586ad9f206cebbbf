/**
 * Order Rate Limiter
 *
 * Token bucket shared by every symbol worker so outbound order requests
 * stay within the account-wide venue limits.
 */

import { logger } from '../logger.js';
import { sleep } from '../utils/sleep.js';
import type { RateLimiterConfig } from './types.js';

export class TokenBucketRateLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly config: RateLimiterConfig,
    private readonly clock: () => number = () => Date.now()
  ) {
    if (config.capacity < 1 || config.refillIntervalMs <= 0) {
      throw new Error('Rate limiter needs capacity >= 1 and a positive refill interval');
    }
    this.tokens = config.capacity;
    this.lastRefill = this.clock();
  }

  /**
   * Take a token if one is available right now
   */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Wait until a token is available, then take it
   */
  async acquire(): Promise<void> {
    while (!this.tryAcquire()) {
      const waitMs = Math.max(1, this.lastRefill + this.config.refillIntervalMs - this.clock());
      logger.debug('Order rate limit reached, waiting', { waitMs });
      await sleep(waitMs);
    }
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.clock();
    const intervals = Math.floor((now - this.lastRefill) / this.config.refillIntervalMs);
    if (intervals <= 0) return;

    this.tokens = Math.min(this.config.capacity, this.tokens + intervals);
    this.lastRefill += intervals * this.config.refillIntervalMs;
  }
}
