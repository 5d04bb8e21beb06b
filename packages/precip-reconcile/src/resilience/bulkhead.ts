/**
 * Bulkhead (bounded concurrency)
 *
 * Caps the number of concurrent executions. Callers beyond the cap wait in a
 * FIFO queue until a slot frees; nothing is rejected and nothing times out in
 * the queue, since every queued download eventually gets its turn.
 *
 * One bulkhead is shared by all downloads of a run regardless of source.
 */

import type { BulkheadConfig, BulkheadStats } from './types.js';

interface QueuedRequest {
  readonly start: () => void;
}

/**
 * @example
 * ```typescript
 * const bulkhead = new Bulkhead({ name: 'artifact-downloads', maxConcurrent: 20 });
 * const bytes = await bulkhead.execute(() => download(url));
 * ```
 */
export class Bulkhead {
  private readonly config: BulkheadConfig;
  private activeCount = 0;
  private peakActiveCount = 0;
  private readonly queue: QueuedRequest[] = [];
  private completedCount = 0;
  private totalExecutionMs = 0;

  constructor(config: BulkheadConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new RangeError(
        `Bulkhead '${config.name}' needs maxConcurrent >= 1, got ${config.maxConcurrent}`
      );
    }
    this.config = config;
  }

  /**
   * Execute function once a slot is available
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeCount >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => {
        this.queue.push({ start: resolve });
      });
    } else {
      this.activeCount++;
    }

    this.peakActiveCount = Math.max(this.peakActiveCount, this.activeCount);
    const startTime = Date.now();

    try {
      return await fn();
    } finally {
      this.completedCount++;
      this.totalExecutionMs += Date.now() - startTime;
      this.release();
    }
  }

  /**
   * Hand the slot to the next waiter, or free it
   */
  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes directly to the waiter; activeCount is unchanged
      next.start();
      return;
    }
    this.activeCount--;
  }

  getStats(): BulkheadStats {
    return {
      name: this.config.name,
      activeCount: this.activeCount,
      queuedCount: this.queue.length,
      completedCount: this.completedCount,
      peakActiveCount: this.peakActiveCount,
      avgExecutionMs:
        this.completedCount > 0 ? this.totalExecutionMs / this.completedCount : 0,
    };
  }
}

/**
 * Create bulkhead with download defaults
 */
export function createBulkhead(
  name: string,
  overrides?: Partial<Omit<BulkheadConfig, 'name'>>
): Bulkhead {
  return new Bulkhead({
    name,
    maxConcurrent: 20,
    ...overrides,
  });
}
