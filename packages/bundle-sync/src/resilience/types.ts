/**
 * Resilience Types
 *
 * Shared configuration and statistics shapes for the rate limiter,
 * bulkhead and keyed lock.
 */

/**
 * Token bucket configuration
 */
export interface TokenBucketConfig {
  /** Bucket capacity (burst size) */
  readonly maxTokens: number;
  /** Tokens added per second */
  readonly refillRate: number;
}

/**
 * Per-host rate limiter configuration
 */
export interface RateLimiterConfig {
  /** Minimum spacing between requests to one host, in milliseconds (0 disables) */
  readonly minIntervalMs: number;
  /** Requests allowed back-to-back before spacing applies (default: 1) */
  readonly burstSize?: number;
}

/**
 * Per-host rate limiter statistics
 */
export interface RateLimiterStats {
  readonly host: string;
  readonly requests: number;
  readonly delayedRequests: number;
  readonly totalWaitMs: number;
}

/**
 * Bulkhead configuration
 */
export interface BulkheadConfig {
  readonly name: string;
  /** Maximum concurrent executions */
  readonly maxConcurrent: number;
}

/**
 * Clock used for token accounting (injectable for tests)
 */
export type Clock = () => number;
