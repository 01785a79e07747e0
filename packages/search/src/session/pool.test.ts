import { describe, it, expect } from 'vitest';
import { WorkerPool, defaultConcurrency } from './pool';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('WorkerPool', () => {
  it('never runs more than its concurrency at once', async () => {
    const pool = new WorkerPool(3);
    let running = 0;
    let peak = 0;

    for (let i = 0; i < 12; i++) {
      await pool.submit(async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((r) => setTimeout(r, 2));
        running--;
      });
    }
    await pool.drain();

    expect(peak).toBe(3);
    expect(running).toBe(0);
    expect(pool.active).toBe(0);
  });

  it('holds submit back while every slot is busy', async () => {
    const pool = new WorkerPool(1);
    const gate = deferred();
    await pool.submit(() => gate.promise);

    let admitted = false;
    const second = pool.submit(async () => undefined).then(() => {
      admitted = true;
    });
    await new Promise((r) => setTimeout(r, 5));
    expect(admitted).toBe(false);

    gate.resolve();
    await second;
    expect(admitted).toBe(true);
    await pool.drain();
  });

  it('rethrows the first task failure from drain', async () => {
    const pool = new WorkerPool(2);
    await pool.submit(async () => {
      throw new Error('first');
    });
    await pool.submit(async () => {
      await new Promise((r) => setTimeout(r, 1));
      throw new Error('second');
    });

    await expect(pool.drain()).rejects.toThrow('first');
  });

  it('rejects a non-positive size', () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
  });
});

describe('defaultConcurrency', () => {
  it('is at least two', () => {
    expect(defaultConcurrency()).toBeGreaterThanOrEqual(2);
  });
});
