/**
 * Bounded worker pool. At most `concurrency` items are in flight; results keep
 * input order. Once the signal aborts no further item is started.
 */

export type PoolSlot<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export async function runBounded<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<PoolSlot<R>[]> {
  const slots: PoolSlot<R>[] = items.map(() => ({ status: 'skipped' }));
  const workerCount = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  let next = 0;

  const drain = async (): Promise<void> => {
    while (next < items.length) {
      if (options.signal?.aborted) {
        return;
      }
      const index = next++;
      try {
        slots[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        slots[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(drain());
  }
  await Promise.all(workers);

  return slots;
}
