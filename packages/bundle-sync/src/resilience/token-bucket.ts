/**
 * Token Bucket
 *
 * Lazily refilled bucket: tokens are recomputed from elapsed time on every
 * call, so no background timer is needed.
 *
 * `reserve()` lets the balance go negative. Each caller is told how long to
 * wait for its own token, which spaces concurrent callers evenly instead of
 * letting them all retry at once.
 */

import type { Clock, TokenBucketConfig } from './types.js';

export class TokenBucket {
  private readonly config: TokenBucketConfig;
  private readonly clock: Clock;
  private tokens: number;
  private lastRefill: number;

  constructor(config: TokenBucketConfig, clock: Clock = Date.now) {
    if (config.maxTokens <= 0 || config.refillRate <= 0) {
      throw new Error('TokenBucket requires positive maxTokens and refillRate');
    }
    this.config = config;
    this.clock = clock;
    this.tokens = config.maxTokens;
    this.lastRefill = clock();
  }

  /**
   * Add tokens for the time elapsed since the last refill
   */
  private refill(): void {
    const now = this.clock();
    const elapsedMs = now - this.lastRefill;
    if (elapsedMs <= 0) return;

    this.tokens = Math.min(
      this.config.maxTokens,
      this.tokens + (elapsedMs * this.config.refillRate) / 1000
    );
    this.lastRefill = now;
  }

  /**
   * Take tokens unconditionally and return how long the caller must wait
   * before its reservation is covered
   */
  reserve(cost = 1): number {
    this.refill();
    this.tokens -= cost;
    return this.tokens >= 0 ? 0 : Math.ceil((-this.tokens / this.config.refillRate) * 1000);
  }
}
