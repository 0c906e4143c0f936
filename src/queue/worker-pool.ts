/**
 * WorkerPool - bounded concurrent job runner
 *
 * Runs up to `concurrency` jobs at once and keeps at most `queueCapacity`
 * waiting jobs. Submissions beyond that are refused with QueueFullError.
 */

import { QueueFullError } from '../errors/custom-errors.js';

export type Job = () => Promise<void>;

export type WorkerPoolOptions = {
  /** Jobs running at the same time (default: 4) */
  concurrency?: number;
  /** Jobs allowed to wait for a free worker (default: 16) */
  queueCapacity?: number;
  /** Called with errors that escape a job */
  onError?: (error: unknown) => void;
};

/**
 * Pool status information
 */
export type PoolStatus = {
  /** Jobs currently running */
  active: number;
  /** Jobs waiting for a worker */
  queued: number;
  concurrency: number;
  queueCapacity: number;
  /** Jobs that finished without throwing */
  completedCount: number;
  /** Jobs that threw */
  failedCount: number;
};

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_QUEUE_CAPACITY = 16;

export class WorkerPool {
  private readonly concurrency: number;
  private readonly queueCapacity: number;
  private readonly onError: (error: unknown) => void;
  private readonly waiting: Job[] = [];
  private readonly drainWaiters: (() => void)[] = [];
  private active = 0;
  private stopped = false;
  private completedCount = 0;
  private failedCount = 0;

  constructor(options: WorkerPoolOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.queueCapacity = Math.max(0, options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this.onError = options.onError ?? ((error) => console.error('Worker pool job error:', error));
  }

  /**
   * Accept a job for execution
   *
   * @throws QueueFullError if every worker is busy and the wait queue is full
   * @throws Error if the pool has been stopped
   */
  submit(job: Job): void {
    if (this.stopped) {
      throw new Error('Cannot submit jobs to a stopped pool');
    }

    if (this.active < this.concurrency) {
      this.run(job);
      return;
    }

    if (this.waiting.length >= this.queueCapacity) {
      throw new QueueFullError(
        `Worker pool is full (${this.active} running, ${this.waiting.length} waiting)`,
      );
    }

    this.waiting.push(job);
  }

  /**
   * Resolve once every accepted job has finished
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /**
   * Refuse new jobs and wait for the accepted ones
   */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.drain();
  }

  getStatus(): PoolStatus {
    return {
      active: this.active,
      queued: this.waiting.length,
      concurrency: this.concurrency,
      queueCapacity: this.queueCapacity,
      completedCount: this.completedCount,
      failedCount: this.failedCount,
    };
  }

  private isIdle(): boolean {
    return this.active === 0 && this.waiting.length === 0;
  }

  private run(job: Job): void {
    this.active++;

    void this.execute(job).finally(() => {
      this.active--;

      const next = this.waiting.shift();
      if (next) {
        this.run(next);
        return;
      }

      if (this.isIdle()) {
        for (const resolve of this.drainWaiters.splice(0)) {
          resolve();
        }
      }
    });
  }

  private async execute(job: Job): Promise<void> {
    try {
      await job();
      this.completedCount++;
    } catch (error) {
      this.failedCount++;
      this.onError(error);
    }
  }
}
