/**
 * Tests for TokenBucketRateLimiter
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TokenBucketRateLimiter } from '../../src/execution/RateLimiter.js';

describe('TokenBucketRateLimiter', () => {
  let now: number;
  const clock = (): number => now;

  beforeEach(() => {
    now = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should allow a burst up to capacity', () => {
    const limiter = new TokenBucketRateLimiter({ capacity: 2, refillIntervalMs: 1000 }, clock);

    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(false);
  });

  it('should refill one token per interval without exceeding capacity', () => {
    const limiter = new TokenBucketRateLimiter({ capacity: 3, refillIntervalMs: 1000 }, clock);
    limiter.tryAcquire();
    limiter.tryAcquire();
    limiter.tryAcquire();

    now = 1500;
    expect(limiter.available()).toBe(1);

    now = 2000;
    expect(limiter.available()).toBe(2);

    now = 60000;
    expect(limiter.available()).toBe(3);
  });

  it('should make acquire wait for the next token', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const limiter = new TokenBucketRateLimiter({ capacity: 1, refillIntervalMs: 500 });
    await limiter.acquire();

    let acquired = false;
    const pending = limiter.acquire().then(() => {
      acquired = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(acquired).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(acquired).toBe(true);
  });

  it('should reject an unusable configuration', () => {
    expect(() => new TokenBucketRateLimiter({ capacity: 0, refillIntervalMs: 1000 })).toThrow();
    expect(() => new TokenBucketRateLimiter({ capacity: 1, refillIntervalMs: 0 })).toThrow();
  });
});
