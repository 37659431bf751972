import { describe, it, expect } from 'vitest';
import { runPool } from '../../src/utils/pool.js';
import { StopSignal } from '../../src/utils/stop-signal.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('runPool', () => {
  it('keeps results in input order and caps concurrency', async () => {
    let inFlight = 0;
    let peak = 0;
    const done: number[] = [];

    const results = await runPool(
      [30, 5, 10, 1],
      2,
      async (ms) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await sleep(ms);
        inFlight--;
        return ms * 2;
      },
      (_r, _item, index) => done.push(index),
    );

    expect(results).toEqual([60, 10, 20, 2]);
    expect(peak).toBe(2);
    expect(done[done.length - 1]).toBe(0);
  });

  it('handles an empty list', async () => {
    await expect(runPool([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('rejects when a worker rejects', async () => {
    await expect(runPool([1], 1, async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
  });
});

describe('StopSignal', () => {
  it('wakes a sleeper early once raised', async () => {
    const stop = new StopSignal();
    const started = Date.now();
    const waiting = stop.wait(10_000);
    stop.raise();
    await waiting;

    expect(Date.now() - started).toBeLessThan(1000);
    expect(stop.raised).toBe(true);
  });

  it('returns at once after it was raised', async () => {
    const stop = new StopSignal();
    stop.raise();
    await expect(stop.wait(10_000)).resolves.toBeUndefined();
  });
});
