import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { NotificationLevel } from '../notifications/notification-level.js';
import { LogLevel } from '../utils/logger.js';
import { minutesToMs } from '../utils/time-utils.js';

/**
 * Fully resolved configuration; every duration is in milliseconds
 */
export type ResolvedConfig = {
  telegram: {
    botToken: string;
    chatMinLevel: NotificationLevel;
  };
  storage: {
    directory: string;
    retentionMs: number;
    sweepIntervalMs: number;
    minFileSize: number;
  };
  download: {
    ytdlpPath: string;
    cookieFile?: string;
    socketTimeout: number;
    maxAttempts: number;
    retryDelayMs: number;
    settleDelayMs: number;
  };
  delivery: {
    maxAttempts: number;
    retryDelayMs: number;
  };
  workers: {
    concurrency: number;
    queueCapacity: number;
  };
  logging: {
    level: LogLevel;
    colors: boolean;
  };
};

export type DefaultConfig = Omit<ResolvedConfig, 'telegram'> & {
  telegram: Omit<ResolvedConfig['telegram'], 'botToken'>;
};

export const DEFAULT_STORAGE_DIR = join(tmpdir(), 'clipcourier-files');

export const defaults: DefaultConfig = {
  telegram: {
    chatMinLevel: NotificationLevel.INFO,
  },
  storage: {
    directory: DEFAULT_STORAGE_DIR,
    retentionMs: minutesToMs(10),
    sweepIntervalMs: minutesToMs(5),
    minFileSize: 1024,
  },
  download: {
    ytdlpPath: 'yt-dlp',
    socketTimeout: 60,
    maxAttempts: 3,
    retryDelayMs: 3000,
    settleDelayMs: 2000,
  },
  delivery: {
    maxAttempts: 2,
    retryDelayMs: 2000,
  },
  workers: {
    concurrency: 4,
    queueCapacity: 16,
  },
  logging: {
    level: LogLevel.INFO,
    colors: true,
  },
};
