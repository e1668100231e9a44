import { sleep } from '../util/async.js';

/**
 * 토큰 버킷 레이트 리미터 — 브로커 Private API 호출 간격 제한
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;  // tokens/ms
  private lastRefill: number;
  private readonly now: () => number;

  constructor(maxPerSec: number = 10, now: () => number = Date.now) {
    if (!(maxPerSec > 0)) throw new Error('maxPerSec must be > 0');
    this.maxTokens = maxPerSec;
    this.tokens = maxPerSec;
    this.refillRate = maxPerSec / 1000;
    this.now = now;
    this.lastRefill = now();
  }

  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens--;
      return;
    }

    // 토큰 없으면 대기
    const waitMs = Math.ceil((1 - this.tokens) / this.refillRate);
    await sleep(waitMs);
    this.refill();
    this.tokens--;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
