import { describe, expect, it, vi } from 'vitest';
import { TimeoutElapsedError, sleep, withTimeout } from '@/utils/timeout';
import { WorkerPool } from '@/utils/workerPool';

describe('WorkerPool', () => {
  it('never runs more handlers than its concurrency', async () => {
    let running = 0;
    let maxRunning = 0;
    const pool = new WorkerPool<number>(
      async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await sleep(10);
        running--;
      },
      { concurrency: 2 },
    );
    for (let i = 0; i < 6; i++) pool.enqueue(i);

    const result = await pool.drain(1_000);
    expect(result).toEqual({ completed: true, started: 6, finished: 6, abandonedQueued: 0, abandonedInFlight: 0 });
    expect(maxRunning).toBe(2);
    expect(pool.peakConcurrency).toBe(2);
  });

  it('runs tasks enqueued by handlers', async () => {
    const seen: string[] = [];
    const pool = new WorkerPool<string>(
      async (task, { enqueue }) => {
        seen.push(task);
        if (task === 'root') {
          enqueue('child-1');
          enqueue('child-2');
        }
      },
      { concurrency: 1 },
    );
    pool.enqueue('root');

    const result = await pool.drain(1_000);
    expect(result.completed).toBe(true);
    expect(seen).toEqual(['root', 'child-1', 'child-2']);
  });

  it('stops at the budget and abandons the rest', async () => {
    const done: number[] = [];
    const pool = new WorkerPool<number>(
      async (task) => {
        await sleep(100);
        done.push(task);
      },
      { concurrency: 1 },
    );
    [1, 2, 3].forEach((t) => pool.enqueue(t));

    const result = await pool.drain(30);
    expect(result).toEqual({ completed: false, started: 1, finished: 0, abandonedQueued: 2, abandonedInFlight: 1 });

    pool.enqueue(4);
    await sleep(120);
    expect(done).toEqual([1]);
  });

  it('reports handler failures and keeps going', async () => {
    const onError = vi.fn();
    const pool = new WorkerPool<number>(
      async (task) => {
        if (task === 2) throw new Error('boom');
      },
      { concurrency: 2, onError },
    );
    [1, 2, 3].forEach((t) => pool.enqueue(t));

    const result = await pool.drain(1_000);
    expect(result.finished).toBe(3);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(2, expect.objectContaining({ message: 'boom' }));
  });

  it('drains an empty pool immediately', async () => {
    const pool = new WorkerPool<number>(async () => undefined, { concurrency: 3 });
    expect((await pool.drain(1_000)).completed).toBe(true);
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => new WorkerPool<number>(async () => undefined, { concurrency: 0 })).toThrow(RangeError);
  });
});

describe('withTimeout', () => {
  it('resolves when the work finishes first', async () => {
    await expect(withTimeout(async () => 'done', 50)).resolves.toBe('done');
  });

  it('rejects with TimeoutElapsedError and aborts the signal', async () => {
    let aborted = false;
    const run = (signal: AbortSignal) =>
      new Promise<string>((_, reject) => {
        signal.addEventListener('abort', () => {
          aborted = true;
          reject(new Error('aborted'));
        });
      });

    await expect(withTimeout(run, 20)).rejects.toBeInstanceOf(TimeoutElapsedError);
    expect(aborted).toBe(true);
  });
});
