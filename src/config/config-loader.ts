import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { type EnvSource, resolveEnvRecursive } from '../utils/env-resolver.js';
import { parseLogLevel } from '../utils/logger.js';
import { secondsToMs } from '../utils/time-utils.js';
import { defaults, type ResolvedConfig } from './config-defaults.js';
import { type Config, formatZodError, validateConfig } from './config-schema.js';

/**
 * Default config file path
 */
export const DEFAULT_CONFIG_PATH = './config.yaml';

export type LoadConfigOptions = {
  /** Variable source for placeholders and BOT_TOKEN (default: process.env) */
  env?: EnvSource;
  /** Fail when the file does not exist instead of using defaults */
  required?: boolean;
};

const seconds = (value: number | undefined, fallbackMs: number): number =>
  value === undefined ? fallbackMs : secondsToMs(value);

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read, resolve and validate a YAML config file
 *
 * @returns Validated file contents (empty when the file is absent and not required)
 * @throws ConfigError if the file is missing but required, or is invalid
 */
export async function readConfigFile(configPath: string, options: LoadConfigOptions = {}): Promise<Config> {
  const absolutePath = resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error) && !options.required) {
      return {};
    }
    if (isMissingFile(error)) {
      throw new ConfigError(`Configuration file not found: "${absolutePath}"`);
    }
    throw new ConfigError(`Failed to read configuration: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvRecursive(raw ?? {}, options.env);
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }

  try {
    return validateConfig(resolved);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(`Invalid configuration: ${formatZodError(error)}`);
    }
    throw error;
  }
}

/**
 * Merge a validated config over the defaults, converting seconds to milliseconds
 *
 * @throws ConfigError if no bot token is available
 */
export function resolveConfig(config: Config, env: EnvSource = process.env): ResolvedConfig {
  const botToken = config.telegram?.botToken ?? env.BOT_TOKEN;
  if (!botToken) {
    throw new ConfigError('Bot token is not set. Add telegram.botToken to the config file or set BOT_TOKEN.');
  }

  const { storage, download, delivery, workers, logging } = config;

  return {
    telegram: {
      botToken,
      chatMinLevel: config.telegram?.chatMinLevel ?? defaults.telegram.chatMinLevel,
    },
    storage: {
      directory: storage?.directory ?? defaults.storage.directory,
      retentionMs: seconds(storage?.retention, defaults.storage.retentionMs),
      sweepIntervalMs: seconds(storage?.sweepInterval, defaults.storage.sweepIntervalMs),
      minFileSize: storage?.minFileSize ?? defaults.storage.minFileSize,
    },
    download: {
      ytdlpPath: download?.ytdlpPath ?? defaults.download.ytdlpPath,
      cookieFile: download?.cookieFile,
      socketTimeout: download?.socketTimeout ?? defaults.download.socketTimeout,
      maxAttempts: download?.maxAttempts ?? defaults.download.maxAttempts,
      retryDelayMs: seconds(download?.retryDelay, defaults.download.retryDelayMs),
      settleDelayMs: seconds(download?.settleDelay, defaults.download.settleDelayMs),
    },
    delivery: {
      maxAttempts: delivery?.maxAttempts ?? defaults.delivery.maxAttempts,
      retryDelayMs: seconds(delivery?.retryDelay, defaults.delivery.retryDelayMs),
    },
    workers: {
      concurrency: workers?.concurrency ?? defaults.workers.concurrency,
      queueCapacity: workers?.queueCapacity ?? defaults.workers.queueCapacity,
    },
    logging: {
      level: logging?.level ? parseLogLevel(logging.level) : defaults.logging.level,
      colors: logging?.colors ?? defaults.logging.colors,
    },
  };
}

/**
 * Load configuration from YAML file and the environment
 *
 * @throws ConfigError if the file is invalid or no bot token is available
 */
export async function loadConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  options: LoadConfigOptions = {},
): Promise<ResolvedConfig> {
  const config = await readConfigFile(configPath, options);
  return resolveConfig(config, options.env ?? process.env);
}
