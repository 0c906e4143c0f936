import type { StorageUsage } from '../downloader/payload-store.js';
import {
  AccessDeniedError,
  DeliveryError,
  EmptyPayloadError,
  errorMessage,
  QueueFullError,
  RetryExhaustedError,
  SearchError,
  ValidationError,
} from '../errors/custom-errors.js';
import type { PoolStatus } from '../queue/worker-pool.js';
import { escapeHtml, formatSize } from '../utils/format-utils.js';
import { SUPPORTED_PLATFORMS } from '../utils/url-validator.js';
import { MIN_QUERY_LENGTH } from './constants.js';

export const WELCOME_TEXT = [
  '🎉 <b>Welcome to ClipCourier</b>',
  '',
  '⚡ <b>Available Features:</b>',
  '',
  '• <b>Download Video</b> - High quality (720p)',
  '• <b>Fast Download</b> - Lower quality for speed',
  '• <b>HD Download</b> - Up to 1080p',
  '• <b>Audio Only</b> - Extract audio from videos',
  '• <b>Search Music</b> - Find songs by lyrics/name',
  '',
  '<code>Choose your desired option below 👇</code>',
].join('\n');

export const HELP_TEXT = [
  '🛠️ <b>ClipCourier - Help Guide</b>',
  '',
  '⚡ <b>Download Options:</b>',
  '• <b>Download Video</b> - High quality with verification',
  '• <b>Fast Download</b> - Lower quality, faster download',
  '• <b>HD Download</b> - Up to 1080p when available',
  '• <b>Audio Only</b> - Extract audio from videos',
  '',
  '🔍 <b>Music Search:</b>',
  '• Search by lyrics or song title',
  '• Automatic download of best match',
  '',
  '💡 <b>Tips:</b>',
  '• If a download fails, it is retried automatically',
  '• Files are verified before sending',
  '• Large videos may take longer',
  '',
  '<code>Choose any option from the main menu!</code>',
].join('\n');

export const SEARCH_PROMPT = '🎵 <b>Music Search</b>\n\nSend song lyrics or title to search:';

export const QUERY_TOO_SHORT = `❌ <b>Please enter at least ${MIN_QUERY_LENGTH} characters</b>`;

export const STILL_WORKING = '⏳ <b>Still working on your previous request</b>\n\nPlease wait until it finishes.';

export const REQUEST_ACCEPTED = '🚀 <b>Starting verified download process...</b>';

export const BUSY_MESSAGE = '🚦 <b>The bot is busy right now</b>\n\nToo many downloads are running. Please try again in a minute.';

export const UNSUPPORTED_URL = `❌ <b>Unsupported URL</b>\n\nSupported platforms: ${SUPPORTED_PLATFORMS.join(', ')}`;

/**
 * Instructions shown after a download option was picked
 */
export function urlInstructions(description: string): string {
  return [
    `📋 <b>${description}</b>`,
    '',
    '🔗 <b>Send the video URL now</b>',
    '',
    '🌐 <b>Supported Platforms:</b>',
    `• ${SUPPORTED_PLATFORMS.join(', ')}`,
    '',
    '<code>Paste your URL below...</code>',
  ].join('\n');
}

export type StatusSnapshot = {
  pool: PoolStatus;
  /** Requesters with a job in flight */
  requesters: number;
  storage: StorageUsage;
};

export function statusText({ pool, requesters, storage }: StatusSnapshot): string {
  return [
    '📊 <b>System Status</b>',
    '',
    `⚙️ <b>Downloads running:</b> ${pool.active}/${pool.concurrency}`,
    `📥 <b>Waiting:</b> ${pool.queued}/${pool.queueCapacity}`,
    `👥 <b>Users served now:</b> ${requesters}`,
    `✅ <b>Completed:</b> ${pool.completedCount}`,
    `💾 <b>Storage:</b> ${storage.files} file(s), ${formatSize(storage.bytes)}`,
    '',
    `🌐 <b>Platforms:</b> ${SUPPORTED_PLATFORMS.join(', ')}`,
  ].join('\n');
}

/**
 * One user-facing message per failure
 */
export function failureMessage(error: unknown): string {
  if (error instanceof ValidationError) {
    return UNSUPPORTED_URL;
  }
  if (error instanceof AccessDeniedError) {
    return error.reason === 'blocked'
      ? '❌ <b>Access blocked</b> - The server is blocking requests. Please try a different video.'
      : '❌ <b>Cannot access content</b> - The video may be private, deleted, or restricted.';
  }
  if (error instanceof EmptyPayloadError) {
    return '❌ <b>No content received</b> - The download completed but the file was empty.';
  }
  if (error instanceof RetryExhaustedError) {
    if (error.lastError instanceof EmptyPayloadError) {
      return failureMessage(error.lastError);
    }
    return `❌ <b>Download failed</b> - All ${error.attempts} attempts failed. Please try again later.`;
  }
  if (error instanceof DeliveryError) {
    return `❌ <b>Upload failed</b>\n${escapeHtml(error.message)}`;
  }
  if (error instanceof SearchError) {
    return '❌ <b>No results found</b>';
  }
  if (error instanceof QueueFullError) {
    return BUSY_MESSAGE;
  }
  return `❌ <b>Download error:</b>\n${escapeHtml(errorMessage(error).slice(0, 150))}`;
}
