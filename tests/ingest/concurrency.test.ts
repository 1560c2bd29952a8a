import { setTimeout as delay } from 'node:timers/promises';

import { describe, expect, it } from 'vitest';

import { chunk, settleBounded } from '../../src/ingest/concurrency.js';

describe('settleBounded', () => {
  it('keeps at most the given number of workers in flight', async () => {
    let active = 0;
    let peak = 0;

    await settleBounded([1, 2, 3, 4, 5], 2, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return item;
    });

    expect(peak).toBe(2);
  });

  it('settles every item in input order even when some fail', async () => {
    const results = await settleBounded(['a', 'b', 'c'], 3, async (item) => {
      if (item === 'b') {
        throw new Error('b failed');
      }
      return item.toUpperCase();
    });

    expect(results[0]).toEqual({ ok: true, value: 'A' });
    expect(results[1].ok).toBe(false);
    expect(results[2]).toEqual({ ok: true, value: 'C' });
  });
});

describe('chunk', () => {
  it('splits into fixed-size batches with a shorter tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
  });
});
