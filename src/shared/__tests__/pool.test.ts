import { describe, it, expect } from 'vitest';
import { withConcurrency } from '../pool.js';

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('withConcurrency', () => {
  it('visits every item once with its index', async () => {
    const seen: string[] = [];
    await withConcurrency(['a', 'b', 'c'], 2, async (item, index) => {
      seen.push(`${index}:${item}`);
    });
    expect(seen.sort()).toEqual(['0:a', '1:b', '2:c']);
  });

  it('keeps at most `concurrency` calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    await withConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
    });
    expect(peak).toBe(3);
  });

  it('starts items in input order', async () => {
    const started: number[] = [];
    await withConcurrency([30, 1, 1, 1], 2, async (delay, index) => {
      started.push(index);
      await sleep(delay);
    });
    expect(started).toEqual([0, 1, 2, 3]);
  });

  it('treats a concurrency below one as one', async () => {
    let inFlight = 0;
    let peak = 0;
    await withConcurrency([1, 2, 3], 0, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(1);
      inFlight--;
    });
    expect(peak).toBe(1);
  });

  it('resolves immediately for no items', async () => {
    let calls = 0;
    await withConcurrency([], 4, async () => {
      calls++;
    });
    expect(calls).toBe(0);
  });

  it('rejects when a call rejects', async () => {
    await expect(
      withConcurrency([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });
});
