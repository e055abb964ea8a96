/**
 * Bounded Concurrency
 *
 * Runs async work over a list with at most `limit` tasks in flight.
 * Results keep input order.
 */

/**
 * Slot-based limiter: `acquire` waits for a free slot, `release` hands it
 * to the oldest waiter (FIFO).
 */
export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  async acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the waiter; active count is unchanged
      next();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.waiters.length;
  }
}

/**
 * Map `items` through `fn` with bounded concurrency.
 *
 * Rejects with the first error thrown by `fn`; callers that need per-item
 * failures should catch inside `fn`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limiter = new ConcurrencyLimiter(limit);
  return Promise.all(
    items.map(async (item, index) => {
      await limiter.acquire();
      try {
        return await fn(item, index);
      } finally {
        limiter.release();
      }
    })
  );
}
