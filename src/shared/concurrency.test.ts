import { describe, it, expect } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';
import { gather } from './concurrency.js';

describe('gather', () => {
  it('returns results in item order regardless of completion order', async () => {
    const results = await gather([30, 10, 20], async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40]);
  });

  it('returns an empty list for no items', async () => {
    expect(await gather([], async () => 1)).toEqual([]);
  });

  it('rejects with the first failure and aborts the siblings', async () => {
    let siblingSignal: AbortSignal | undefined;
    const failure = new Error('b failed');

    await expect(
      gather(['a', 'b'], async (item, signal) => {
        if (item === 'b') throw failure;
        siblingSignal = signal;
        await delay(5);
        return item;
      }),
    ).rejects.toBe(failure);

    expect(siblingSignal?.aborted).toBe(true);
    expect(siblingSignal?.reason).toBe(failure);
  });

  it('hands an aborted signal to the tasks when the parent is already aborted', async () => {
    const parent = new AbortController();
    const reason = new Error('parent gone');
    parent.abort(reason);

    const seen = await gather(['a'], async (_item, signal) => signal.reason, parent.signal);

    expect(seen).toEqual([reason]);
  });

  it('forwards a later parent abort to running tasks', async () => {
    const parent = new AbortController();

    const pending = gather(
      ['a'],
      async (_item, signal) => {
        await delay(5);
        signal.throwIfAborted();
        return 'done';
      },
      parent.signal,
    );
    parent.abort(new Error('interrupted'));

    await expect(pending).rejects.toThrow('interrupted');
  });
});
