import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { RateLimiter } from '../src/execution/rate-limiter.js';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should allow immediate requests under limit', async () => {
    const limiter = new RateLimiter(10, () => Date.now());
    const start = Date.now();
    for (let i = 0; i < 10; i++) {
      await limiter.acquire();
    }
    expect(Date.now() - start).toBe(0);
  });

  it('should throttle when tokens exhausted', async () => {
    const limiter = new RateLimiter(2, () => Date.now());
    await limiter.acquire();
    await limiter.acquire();

    let done = false;
    const pending = limiter.acquire().then(() => {
      done = true;
    });

    // 2/s → 토큰 1개에 500ms
    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('should refill from the injected clock', async () => {
    let now = 0;
    const limiter = new RateLimiter(1, () => now);
    await limiter.acquire();
    now = 1000;
    let done = false;
    await limiter.acquire().then(() => {
      done = true;
    });
    expect(done).toBe(true);
  });

  it('should reject a non-positive rate', () => {
    expect(() => new RateLimiter(0)).toThrow('maxPerSec');
  });
});
