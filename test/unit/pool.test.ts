import { describe, it, expect } from 'vitest';
import { WorkerPool } from '../../src/utils/pool.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('WorkerPool', () => {
  it('rejects a non-positive size', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
    expect(() => new WorkerPool(1.5)).toThrow(RangeError);
  });

  it('never runs more than `size` tasks at once', async () => {
    const pool = new WorkerPool(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const runs = gates.map((gate, i) => pool.run(async () => {
      await gate.promise;
      return i;
    }));

    await Promise.resolve();
    expect(pool.activeCount).toBe(2);
    expect(pool.pendingCount).toBe(2);

    for (const gate of gates) gate.resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2, 3]);
    expect(pool.peakActive).toBe(2);
    expect(pool.activeCount).toBe(0);
  });

  it('releases the slot when a task throws', async () => {
    const pool = new WorkerPool(1);
    await expect(pool.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(pool.activeCount).toBe(0);
    expect(await pool.run(async () => 'next')).toBe('next');
  });
});
