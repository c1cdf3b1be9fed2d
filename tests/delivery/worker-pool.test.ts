import { runBounded } from '../../src/delivery/worker-pool';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('runBounded', () => {
  it('should keep results in input order', async () => {
    const delays = [30, 5, 15];
    const slots = await runBounded(delays, async (delay, index) => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return index * 10;
    }, { concurrency: 3 });

    expect(slots).toEqual([
      { status: 'fulfilled', value: 0 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 20 }
    ]);
  });

  it('should never exceed the concurrency bound', async () => {
    let active = 0;
    let peak = 0;
    await runBounded([1, 2, 3, 4, 5, 6, 7], async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
    }, { concurrency: 2 });

    expect(peak).toBe(2);
  });

  it('should isolate a rejected item', async () => {
    const failure = new Error('boom');
    const slots = await runBounded(['a', 'b', 'c'], async item => {
      if (item === 'b') throw failure;
      return item.toUpperCase();
    }, { concurrency: 1 });

    expect(slots).toEqual([
      { status: 'fulfilled', value: 'A' },
      { status: 'rejected', reason: failure },
      { status: 'fulfilled', value: 'C' }
    ]);
  });

  it('should skip items not started before the signal aborted', async () => {
    const controller = new AbortController();
    const gate = deferred();
    const started: number[] = [];

    const run = runBounded([0, 1, 2, 3], async item => {
      started.push(item);
      if (item === 0) {
        controller.abort();
        await gate.promise;
      }
      return item;
    }, { concurrency: 1, signal: controller.signal });
    gate.resolve();
    const slots = await run;

    expect(started).toEqual([0]);
    expect(slots.map(slot => slot.status)).toEqual(['fulfilled', 'skipped', 'skipped', 'skipped']);
  });

  it('should handle an empty list', async () => {
    expect(await runBounded([], async () => 1, { concurrency: 4 })).toEqual([]);
  });
});
