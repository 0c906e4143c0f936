import { describe, expect, it, vi } from 'vitest';
import { QueueFullError } from '../errors/custom-errors.js';
import { WorkerPool } from './worker-pool.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('WorkerPool', () => {
  it('should run up to the concurrency limit and queue the rest', async () => {
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];
    const pool = new WorkerPool({ concurrency: 2, queueCapacity: 5 });

    gates.forEach((gate, index) => {
      pool.submit(async () => {
        started.push(index);
        await gate.promise;
      });
    });

    expect(started).toEqual([0, 1]);
    expect(pool.getStatus()).toMatchObject({ active: 2, queued: 1 });

    gates[0]?.resolve();
    await vi.waitFor(() => expect(started).toEqual([0, 1, 2]));

    gates[1]?.resolve();
    gates[2]?.resolve();
    await pool.drain();

    expect(pool.getStatus()).toEqual({
      active: 0,
      queued: 0,
      concurrency: 2,
      queueCapacity: 5,
      completedCount: 3,
      failedCount: 0,
    });
  });

  it('should refuse submissions beyond the queue capacity', async () => {
    const gate = deferred();
    const pool = new WorkerPool({ concurrency: 1, queueCapacity: 1 });

    pool.submit(() => gate.promise);
    pool.submit(() => gate.promise);

    expect(() => pool.submit(async () => {})).toThrow(QueueFullError);
    expect(() => pool.submit(async () => {})).toThrow('Worker pool is full (1 running, 1 waiting)');

    gate.resolve();
    await pool.drain();
    expect(pool.getStatus().completedCount).toBe(2);
  });

  it('should count failing jobs and keep running the queue', async () => {
    const onError = vi.fn();
    const ran: string[] = [];
    const pool = new WorkerPool({ concurrency: 1, onError });

    pool.submit(async () => {
      throw new Error('job failed');
    });
    pool.submit(async () => {
      ran.push('second');
    });
    await pool.drain();

    expect(ran).toEqual(['second']);
    expect(onError).toHaveBeenCalledWith(new Error('job failed'));
    expect(pool.getStatus()).toMatchObject({ completedCount: 1, failedCount: 1 });
  });

  it('should resolve drain immediately when idle', async () => {
    const pool = new WorkerPool();
    await expect(pool.drain()).resolves.toBeUndefined();
  });

  it('should refuse jobs after stop and wait for running ones', async () => {
    const gate = deferred();
    let finished = false;
    const pool = new WorkerPool({ concurrency: 1 });

    pool.submit(async () => {
      await gate.promise;
      finished = true;
    });

    const stopping = pool.stop();
    expect(() => pool.submit(async () => {})).toThrow('Cannot submit jobs to a stopped pool');

    gate.resolve();
    await stopping;
    expect(finished).toBe(true);
  });
});
