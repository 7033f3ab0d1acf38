/**
 * Bounded worker pool.
 *
 * Results land in a pre-sized array by submission index, so callers see input
 * order regardless of completion order. The first rejection stops workers from
 * picking up new items and rejects the whole call once in-flight items settle.
 */

import { setTimeout as delay } from 'node:timers/promises';

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(limit, items.length));
  let next = 0;
  const state: { failure: { error: unknown } | null } = { failure: null };

  const worker = async (): Promise<void> => {
    while (state.failure === null && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (state.failure !== null) {
    throw state.failure.error;
  }
  return results;
}

/**
 * Waits ms, rejecting with signal.reason if the signal fires first.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw signal.reason;
    throw err;
  }
}
