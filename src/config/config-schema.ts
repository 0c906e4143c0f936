/**
 * Zod schemas for configuration validation
 *
 * The schemas describe the YAML file; types are inferred from them so the two
 * stay in sync. Durations in the file are seconds.
 */

import { z } from 'zod';
import { NotificationLevelSchema } from '../notifications/notification-level.js';

const LogLevelNameSchema = z.enum(['debug', 'info', 'success', 'warning', 'error', 'highlight']);

/**
 * Bot credentials
 */
export const TelegramSettingsSchema = z.object({
  botToken: z.string().min(1).optional().describe('Bot token (falls back to BOT_TOKEN)'),
  chatMinLevel: NotificationLevelSchema.optional().describe('Minimum level of status messages sent to chats'),
});

export type TelegramSettings = z.infer<typeof TelegramSettingsSchema>;

/**
 * Shared storage directory and its retention sweeper
 */
export const StorageSettingsSchema = z.object({
  directory: z.string().min(1).optional().describe('Directory for fetched files'),
  retention: z.number().positive().optional().describe('Age in seconds after which files are swept'),
  sweepInterval: z.number().positive().optional().describe('Seconds between sweeps'),
  minFileSize: z.number().int().nonnegative().optional().describe('Files of this many bytes or fewer are rejected'),
});

export type StorageSettings = z.infer<typeof StorageSettingsSchema>;

/**
 * Fetch engine and its retry loop
 */
export const DownloadSettingsSchema = z.object({
  ytdlpPath: z.string().min(1).optional().describe('yt-dlp executable'),
  cookieFile: z.string().min(1).optional().describe('Cookie file in Netscape format'),
  socketTimeout: z.number().int().positive().optional().describe('Engine socket timeout in seconds'),
  maxAttempts: z.number().int().positive().optional().describe('Fetch attempts per request'),
  retryDelay: z.number().nonnegative().optional().describe('Seconds between fetch attempts'),
  settleDelay: z.number().nonnegative().optional().describe('Seconds to wait before looking for the fetched file'),
});

export type DownloadSettings = z.infer<typeof DownloadSettingsSchema>;

/**
 * Upload retries
 */
export const DeliverySettingsSchema = z.object({
  maxAttempts: z.number().int().positive().optional().describe('Media uploads before the document fallback'),
  retryDelay: z.number().nonnegative().optional().describe('Seconds between upload attempts'),
});

export type DeliverySettings = z.infer<typeof DeliverySettingsSchema>;

export const WorkerSettingsSchema = z.object({
  concurrency: z.number().int().positive().optional().describe('Requests processed at the same time'),
  queueCapacity: z.number().int().nonnegative().optional().describe('Requests allowed to wait for a worker'),
});

export type WorkerSettings = z.infer<typeof WorkerSettingsSchema>;

export const LoggingSettingsSchema = z.object({
  level: LogLevelNameSchema.optional().describe('Console log level'),
  colors: z.boolean().optional().describe('Colored console output'),
});

export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;

/**
 * Main configuration schema
 */
export const ConfigSchema = z.strictObject({
  telegram: TelegramSettingsSchema.optional(),
  storage: StorageSettingsSchema.optional(),
  download: DownloadSettingsSchema.optional(),
  delivery: DeliverySettingsSchema.optional(),
  workers: WorkerSettingsSchema.optional(),
  logging: LoggingSettingsSchema.optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Validate configuration using Zod
 *
 * @throws z.ZodError if validation fails
 */
export function validateConfig(rawConfig: unknown): Config {
  return ConfigSchema.parse(rawConfig);
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
