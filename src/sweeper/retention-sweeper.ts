/**
 * RetentionSweeper - periodic cleanup of the shared storage directory
 *
 * Deletes regular files older than the retention threshold. A failing entry
 * is counted and skipped; a failing cycle is logged and the next one is still
 * scheduled.
 */

import * as fsPromises from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage } from '../errors/custom-errors.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { formatElapsed } from '../utils/time-utils.js';

export type SweepResult = {
  scanned: number;
  deleted: number;
  failed: number;
};

export type RetentionSweeperOptions = {
  /** Time between cycles (default: 5 minutes) */
  intervalMs?: number;
  /** Minimum file age before deletion (default: 10 minutes) */
  thresholdMs?: number;
  logger?: Logger;
  /** Clock, injectable for tests */
  now?: () => number;
};

export const DEFAULT_SWEEP_INTERVAL_MS = 5 * 60_000;
export const DEFAULT_RETENTION_MS = 10 * 60_000;

/**
 * Creation time of a file in whole milliseconds; birth time where the filesystem records it, else ctime
 */
function createdAt(stats: { birthtimeMs: number; ctimeMs: number }): number {
  return Math.floor(stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs);
}

export class RetentionSweeper {
  private readonly intervalMs: number;
  private readonly thresholdMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(
    private readonly directory: string,
    options: RetentionSweeperOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.thresholdMs = options.thresholdMs ?? DEFAULT_RETENTION_MS;
    this.logger = options.logger ?? defaultLogger.child('sweeper');
    this.now = options.now ?? Date.now;
  }

  /**
   * Clear everything left over from a previous run, then sweep periodically
   */
  async start(): Promise<SweepResult> {
    if (this.running) {
      throw new Error('Sweeper is already running');
    }
    this.running = true;

    const initial = await this.runCycle(0);
    this.scheduleNext();
    this.logger.info(
      `Sweeping ${this.directory} every ${formatElapsed(this.intervalMs)} (retention ${formatElapsed(this.thresholdMs)})`,
    );
    return initial;
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Delete regular files whose age is at least the threshold
   *
   * @throws Error if the directory cannot be listed (a missing directory is empty)
   */
  async sweep(thresholdMs: number = this.thresholdMs): Promise<SweepResult> {
    const result: SweepResult = { scanned: 0, deleted: 0, failed: 0 };
    const now = this.now();

    let names: string[];
    try {
      names = await fsPromises.readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return result;
      }
      throw error;
    }

    for (const name of names) {
      const path = join(this.directory, name);
      try {
        // biome-ignore lint/performance/noAwaitInLoops: Entries are handled one by one
        const stats = await fsPromises.stat(path);
        if (!stats.isFile()) continue;

        result.scanned++;
        if (now - createdAt(stats) < thresholdMs) continue;

        await fsPromises.unlink(path);
        result.deleted++;
        this.logger.debug(`Deleted ${name}`);
      } catch (error) {
        result.failed++;
        this.logger.warning(`Failed to sweep ${name}: ${errorMessage(error)}`);
      }
    }

    return result;
  }

  private async runCycle(thresholdMs?: number): Promise<SweepResult> {
    try {
      const result = await this.sweep(thresholdMs);
      if (result.deleted > 0 || result.failed > 0) {
        this.logger.info(`Swept ${result.deleted}/${result.scanned} file(s), ${result.failed} failure(s)`);
      }
      return result;
    } catch (error) {
      this.logger.error(`Sweep failed: ${errorMessage(error)}`);
      return { scanned: 0, deleted: 0, failed: 0 };
    }
  }

  private scheduleNext(): void {
    if (!this.running) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runCycle().then(() => this.scheduleNext());
    }, this.intervalMs);
    this.timer.unref();
  }
}
