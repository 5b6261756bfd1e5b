/**
 * Per-Host Rate Limiter (Token Bucket Algorithm)
 *
 * Keeps the request rate to each upstream host at or below one request per
 * `minIntervalMs`. Each host gets its own bucket, so a slow download from
 * one repository never holds back metadata queries to another.
 *
 * ALGORITHM:
 * - Bucket holds up to `burstSize` tokens (default 1: no bursts)
 * - Tokens refill at 1000 / minIntervalMs per second
 * - Each request reserves 1 token and sleeps until it is covered
 */

import type { Clock, RateLimiterConfig, RateLimiterStats } from './types.js';
import { TokenBucket } from './token-bucket.js';

interface HostState {
  readonly bucket: TokenBucket;
  requests: number;
  delayedRequests: number;
  totalWaitMs: number;
}

/**
 * Multi-host rate limiter
 *
 * @example
 * ```typescript
 * const limiter = new HostRateLimiter({ minIntervalMs: 300 });
 *
 * await limiter.acquire('https://search.maven.org/solrsearch/select?q=...');
 * const response = await fetch(url);
 * ```
 */
export class HostRateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly hosts = new Map<string, HostState>();

  constructor(
    config: RateLimiterConfig,
    options: { clock?: Clock; sleep?: (ms: number) => Promise<void> } = {}
  ) {
    if (config.minIntervalMs < 0) {
      throw new Error('minIntervalMs must not be negative');
    }
    this.config = config;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  get enabled(): boolean {
    return this.config.minIntervalMs > 0;
  }

  /**
   * Reserve a request slot for the URL's host and return the wait in ms
   */
  reserve(url: string): number {
    const state = this.getHostState(hostOf(url));
    state.requests++;

    if (!this.enabled) {
      return 0;
    }

    const waitMs = state.bucket.reserve();
    if (waitMs > 0) {
      state.delayedRequests++;
      state.totalWaitMs += waitMs;
    }
    return waitMs;
  }

  /**
   * Wait until a request to the URL's host is allowed
   */
  async acquire(url: string): Promise<void> {
    const waitMs = this.reserve(url);
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }

  /**
   * Request counts and waits for every host seen so far
   */
  getAllStats(): readonly RateLimiterStats[] {
    return Array.from(this.hosts.entries()).map(([host, state]) => toStats(host, state));
  }

  private getHostState(host: string): HostState {
    let state = this.hosts.get(host);

    if (!state) {
      state = {
        bucket: new TokenBucket(
          {
            maxTokens: this.config.burstSize ?? 1,
            refillRate: this.enabled ? 1000 / this.config.minIntervalMs : 1,
          },
          this.clock
        ),
        requests: 0,
        delayedRequests: 0,
        totalWaitMs: 0,
      };
      this.hosts.set(host, state);
    }

    return state;
  }
}

function toStats(host: string, state: HostState): RateLimiterStats {
  return {
    host,
    requests: state.requests,
    delayedRequests: state.delayedRequests,
    totalWaitMs: state.totalWaitMs,
  };
}

/**
 * Host part of a URL; unparseable URLs share one bucket keyed by the raw string
 */
export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}
