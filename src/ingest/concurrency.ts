import pLimit from 'p-limit';

export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Runs `worker` over every item with at most `concurrency` in flight and
 * waits for all of them. One failure never cancels its siblings.
 */
export async function settleBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  const limit = pLimit(Math.max(1, Math.floor(concurrency)));
  const results = await Promise.allSettled(items.map((item, index) => limit(() => worker(item, index))));

  return results.map((result): Settled<R> =>
    result.status === 'fulfilled' ? { ok: true, value: result.value } : { ok: false, error: result.reason },
  );
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) {
    throw new RangeError(`chunk size must be positive, got ${size}`);
  }
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
}
