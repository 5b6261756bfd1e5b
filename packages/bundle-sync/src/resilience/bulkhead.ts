/**
 * Bulkhead Isolation Pattern
 *
 * Bounded worker pool for per-artifact reconciliation work. At most
 * `maxConcurrent` tasks run at once; the rest wait in FIFO order.
 *
 * DESIGN:
 * - Limit concurrent executions
 * - Queue overflow requests, unbounded
 */

import type { BulkheadConfig } from './types.js';

/**
 * Queued execution request
 */
interface QueuedRequest {
  readonly start: () => void;
}

/**
 * @example
 * ```typescript
 * const bulkhead = new Bulkhead({ name: 'reconcile', maxConcurrent: 4 });
 *
 * const outcomes = await bulkhead.map(entries, (entry) => reconcileOne(entry));
 * ```
 */
export class Bulkhead {
  private readonly config: BulkheadConfig;
  private activeCount = 0;
  private readonly queue: QueuedRequest[] = [];

  constructor(config: BulkheadConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new Error(`Bulkhead '${config.name}' needs maxConcurrent >= 1`);
    }
    this.config = config;
  }

  /**
   * Execute function with bulkhead protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.config.maxConcurrent) {
      return this.executeImmediate(fn);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        start: () => {
          this.executeImmediate(fn).then(resolve, reject);
        },
      });
    });
  }

  /**
   * Run `fn` over every item and return results in input order
   */
  async map<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O>): Promise<O[]> {
    return Promise.all(items.map((item, index) => this.execute(() => fn(item, index))));
  }

  /**
   * Execute immediately (slot available)
   */
  private async executeImmediate<T>(fn: () => Promise<T>): Promise<T> {
    this.activeCount++;

    try {
      return await fn();
    } finally {
      this.activeCount--;
      this.processNextQueued();
    }
  }

  /**
   * Process next queued request
   */
  private processNextQueued(): void {
    if (this.activeCount >= this.config.maxConcurrent) {
      return;
    }

    const request = this.queue.shift();
    if (request) {
      request.start();
    }
  }
}
