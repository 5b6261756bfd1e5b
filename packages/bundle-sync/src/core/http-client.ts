/**
 * HTTP Client for bundle sync
 *
 * Centralizes every upstream request with:
 * - Per-host politeness via HostRateLimiter
 * - Configurable timeouts via AbortController
 * - Optional retry with exponential backoff and jitter
 * - Errors mapped onto the sync error taxonomy
 *
 * Built on the native fetch API.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 30000 }, rateLimiter);
 *
 * const data = await client.fetchJSON('https://search.maven.org/solrsearch/select?q=...');
 * const jar = await client.fetchBytes(jarUrl, { timeoutMs: 60000 });
 * ```
 */

import { MalformedResponseError, TransportError } from './errors.js';
import { logger } from './utils/logger.js';
import type { HostRateLimiter } from '../resilience/rate-limiter.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts for retryable failures (default: 0) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor to prevent thundering herd (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx HTTP response
 */
export class HTTPError extends TransportError {
  readonly statusCode: number;

  constructor(statusCode: number, statusText: string, url: string) {
    super(`HTTP ${statusCode}: ${statusText}`, url);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`, url);
    this.name = 'HTTPTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection failed, DNS resolution, etc.)
 */
export class HTTPNetworkError extends TransportError {
  constructor(url: string, cause: unknown) {
    super(`Network error: ${cause instanceof Error ? cause.message : String(cause)}`, url, { cause });
    this.name = 'HTTPNetworkError';
  }
}

/**
 * Response body is not valid JSON
 */
export class HTTPJSONParseError extends MalformedResponseError {
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: unknown) {
    super(
      `Failed to parse JSON response: ${cause instanceof Error ? cause.message : String(cause)}`,
      url,
      { cause }
    );
    this.name = 'HTTPJSONParseError';
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export const DEFAULT_HTTP_CLIENT_CONFIG: HTTPClientConfig = {
  maxRetries: 0,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 30000,
  userAgent: 'bundle-sync/1.0',
  jitterFactor: 0.1,
};

export class HTTPClient {
  private readonly config: HTTPClientConfig;
  private readonly rateLimiter?: HostRateLimiter;

  constructor(config?: Partial<HTTPClientConfig>, rateLimiter?: HostRateLimiter) {
    this.config = { ...DEFAULT_HTTP_CLIENT_CONFIG, ...config };
    this.rateLimiter = rateLimiter;
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {TransportError} For HTTP errors, timeouts and network failures
   * @throws {HTTPJSONParseError} If the body is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const text = await this.fetchText(url, options);

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new HTTPJSONParseError(url, text, error);
    }
  }

  /**
   * Fetch a response body as UTF-8 text
   */
  async fetchText(url: string, options?: FetchOptions): Promise<string> {
    return this.fetchWithRetry(url, options, (response) => response.text());
  }

  /**
   * Fetch a response body as raw bytes
   */
  async fetchBytes(url: string, options?: FetchOptions): Promise<Buffer> {
    const body = await this.fetchWithRetry(url, options, (response) => response.arrayBuffer());
    return Buffer.from(body);
  }

  /**
   * Run a request with retry logic; `read` consumes the body of a 2xx response
   */
  private async fetchWithRetry<T>(
    url: string,
    options: FetchOptions | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const maxRetries = options?.retries ?? this.config.maxRetries;
    let lastError: TransportError | null = null;

    for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
      const isLastAttempt = attempt === maxRetries + 1;

      try {
        return await this.fetchWithTimeout(url, options, read);
      } catch (error) {
        lastError = error instanceof TransportError ? error : new HTTPNetworkError(url, error);

        if (!this.isRetryableError(lastError) || isLastAttempt) {
          throw lastError;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          error: lastError.message,
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }

    throw lastError ?? new HTTPNetworkError(url, new Error('No attempts made'));
  }

  /**
   * Single attempt under one AbortController timeout
   *
   * The timer covers both the response headers and the body read, so a
   * stalled download times out as well.
   */
  private async fetchWithTimeout<T>(
    url: string,
    options: FetchOptions | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    if (this.rateLimiter) {
      await this.rateLimiter.acquire(url);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HTTPError(response.status, response.statusText, url);
      }

      return await read(response);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  /**
   * Determine if HTTP status code is retryable
   */
  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 ||
      status === 429 ||
      status === 500 ||
      status === 502 ||
      status === 503 ||
      status === 504
    );
  }

  private isRetryableError(error: TransportError): boolean {
    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }
    return error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
