/**
 * Host Rate Limiter Tests
 *
 * Uses an injected clock and sleep so no test waits on real time.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HostRateLimiter, hostOf } from '../../../resilience/rate-limiter.js';
import { TokenBucket } from '../../../resilience/token-bucket.js';

describe('HostRateLimiter', () => {
  let now: number;
  let limiter: HostRateLimiter;
  const sleep = vi.fn(async (_ms: number) => undefined);

  beforeEach(() => {
    now = 0;
    sleep.mockClear();
    limiter = new HostRateLimiter({ minIntervalMs: 250 }, { clock: () => now, sleep });
  });

  it('should space back-to-back reservations to one host', () => {
    expect(limiter.reserve('https://repo.example.org/a.jar')).toBe(0);
    expect(limiter.reserve('https://repo.example.org/b.jar')).toBe(250);
    expect(limiter.reserve('https://repo.example.org/c.jar')).toBe(500);
  });

  it('should keep separate buckets per host', () => {
    expect(limiter.reserve('https://one.example.org/x')).toBe(0);
    expect(limiter.reserve('https://two.example.org/x')).toBe(0);
  });

  it('should refill as the clock advances', () => {
    limiter.reserve('https://repo.example.org/a');
    limiter.reserve('https://repo.example.org/a');
    now = 500;
    expect(limiter.reserve('https://repo.example.org/a')).toBe(0);
  });

  it('should track per-host stats', () => {
    limiter.reserve('https://repo.example.org/a');
    limiter.reserve('https://repo.example.org/b');

    expect(limiter.getAllStats()).toEqual([
      { host: 'repo.example.org', requests: 2, delayedRequests: 1, totalWaitMs: 250 },
    ]);
  });

  it('should sleep only when a wait is needed', async () => {
    await limiter.acquire('https://repo.example.org/a');
    await limiter.acquire('https://repo.example.org/b');

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it('should never wait when disabled', async () => {
    const disabled = new HostRateLimiter({ minIntervalMs: 0 }, { clock: () => now, sleep });

    expect(disabled.enabled).toBe(false);
    await disabled.acquire('https://repo.example.org/a');
    await disabled.acquire('https://repo.example.org/a');

    expect(sleep).not.toHaveBeenCalled();
    expect(disabled.getAllStats()).toEqual([
      { host: 'repo.example.org', requests: 2, delayedRequests: 0, totalWaitMs: 0 },
    ]);
  });

  it('should reject a negative interval', () => {
    expect(() => new HostRateLimiter({ minIntervalMs: -1 })).toThrow(
      'minIntervalMs must not be negative'
    );
  });

});

describe('hostOf', () => {
  it('should return the host of a URL', () => {
    expect(hostOf('https://repo1.maven.org/maven2/org/x.jar')).toBe('repo1.maven.org');
    expect(hostOf('http://localhost:8080/x')).toBe('localhost:8080');
  });

  it('should fall back to the raw string', () => {
    expect(hostOf('not a url')).toBe('not a url');
  });
});

describe('TokenBucket', () => {
  it('should allow a burst and then queue reservations', () => {
    let now = 0;
    const bucket = new TokenBucket({ maxTokens: 2, refillRate: 4 }, () => now);

    expect(bucket.reserve()).toBe(0);
    expect(bucket.reserve()).toBe(0);
    expect(bucket.reserve()).toBe(250);
    expect(bucket.reserve()).toBe(500);

    now = 1000;
    expect(bucket.reserve()).toBe(0);
  });

  it('should reject non-positive configuration', () => {
    expect(() => new TokenBucket({ maxTokens: 0, refillRate: 1 })).toThrow();
  });
});
