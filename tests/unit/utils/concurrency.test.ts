import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter, mapWithConcurrency } from '../../../src/utils/concurrency.js';
import { compareCodeUnits, sortByKey } from '../../../src/utils/ordering.js';

describe('ConcurrencyLimiter', () => {
  it('rejects non-positive limits', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
  });

  it('queues acquirers beyond the limit and hands slots over in order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];

    await limiter.acquire();
    const second = limiter.acquire().then(() => order.push('second'));
    const third = limiter.acquire().then(() => order.push('third'));
    expect(limiter.activeCount).toBe(1);
    expect(limiter.queuedCount).toBe(2);

    limiter.release();
    await second;
    limiter.release();
    await third;
    limiter.release();

    expect(order).toEqual(['second', 'third']);
    expect(limiter.activeCount).toBe(0);
    expect(limiter.queuedCount).toBe(0);
  });
});

describe('mapWithConcurrency', () => {
  it('keeps input order regardless of completion order', async () => {
    const delays = [30, 5, 15, 0];

    const results = await mapWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    });

    expect(peak).toBe(3);
  });

  it('rejects with the first error', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('item 2 failed');
        return n;
      })
    ).rejects.toThrow('item 2 failed');
  });
});

describe('ordering', () => {
  it('sorts by UTF-16 code units rather than locale', () => {
    expect(['b', 'B', 'a', '_', 'A'].sort(compareCodeUnits)).toEqual(['A', 'B', '_', 'a', 'b']);
  });

  it('sorts by key without mutating the input', () => {
    const items = [{ id: 'z' }, { id: 'a' }];

    expect(sortByKey(items, (item) => item.id)).toEqual([{ id: 'a' }, { id: 'z' }]);
    expect(items[0]?.id).toBe('z');
  });
});
