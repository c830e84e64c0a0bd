import { describe, it, expect } from 'vitest';
import { ConcurrencyGate } from '../concurrency.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ConcurrencyGate', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new ConcurrencyGate(0)).toThrow(RangeError);
  });

  it('runs at most `limit` tasks at once, in arrival order', async () => {
    const gate = new ConcurrencyGate(2);
    const started: number[] = [];
    const blockers = [deferred(), deferred(), deferred()];

    const runs = blockers.map((blocker, i) =>
      gate.run(async () => {
        started.push(i);
        await blocker.promise;
        return i;
      })
    );

    await Promise.resolve();
    expect(started).toEqual([0, 1]);
    expect(gate.running).toBe(2);
    expect(gate.pending).toBe(1);

    blockers[0].resolve();
    await runs[0];
    await Promise.resolve();
    expect(started).toEqual([0, 1, 2]);

    blockers[1].resolve();
    blockers[2].resolve();
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
    expect(gate.running).toBe(0);
  });

  it('frees the slot when a task fails', async () => {
    const gate = new ConcurrencyGate(1);
    await expect(gate.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(gate.run(async () => 'next')).resolves.toBe('next');
    expect(gate.running).toBe(0);
  });
});
