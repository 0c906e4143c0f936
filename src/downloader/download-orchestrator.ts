import { basename } from 'node:path';
import { getFormatDirectives, pickDirective } from '../engine/format-directives.js';
import type { FormatDirective, MediaEngine } from '../engine/types.js';
import { AccessDeniedError, EmptyPayloadError, errorMessage } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { NotificationLevel } from '../notifications/notifier.js';
import { createDownloadRetryPolicy, executeWithRetry, type RetryPolicy } from '../queue/retry-strategy.js';
import type { MediaMetadata, RequestContext, StoredPayload } from '../types/media.types.js';
import { escapeHtml, formatSize } from '../utils/format-utils.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { formatElapsed, sleep as defaultSleep } from '../utils/time-utils.js';
import type { PayloadStore } from './payload-store.js';

export type DownloadOrchestratorOptions = {
  engine: MediaEngine;
  store: PayloadStore;
  /** ffmpeg is available, so audio can be extracted to mp3 */
  canTranscode: boolean;
  retryPolicy?: RetryPolicy;
  /** Pause between the end of a fetch and file discovery */
  settleDelayMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * A verified download and the metadata probed for it
 */
export type FetchOutcome = {
  metadata: MediaMetadata;
  payload: StoredPayload;
};

/**
 * Record of one loop iteration, kept for debug logs
 */
type DownloadAttempt = {
  attempt: number;
  directive: FormatDirective;
  filePath?: string;
  size: number;
  outcome: 'accepted' | 'empty';
};

export const DEFAULT_SETTLE_DELAY_MS = 2000;

/**
 * Drives one request from validated URL to a verified file on disk
 *
 * Probe (once, cached), fetch with the profile's format directive, discover
 * the file carrying the request token, verify its size. Failures go through
 * the retry policy; every retry and every final failure purges the token's
 * files first.
 */
export class DownloadOrchestrator {
  private readonly engine: MediaEngine;
  private readonly store: PayloadStore;
  private readonly canTranscode: boolean;
  private readonly retryPolicy: RetryPolicy;
  private readonly settleDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: DownloadOrchestratorOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.canTranscode = options.canTranscode;
    this.retryPolicy = options.retryPolicy ?? createDownloadRetryPolicy();
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.logger = options.logger ?? defaultLogger.child('download');
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetch(ctx: RequestContext, notifier: Notifier): Promise<FetchOutcome> {
    const startedAt = Date.now();
    const token = this.store.createToken(ctx.requesterId);
    const outputTemplate = this.store.outputTemplate(token);
    const directives = getFormatDirectives(ctx, this.canTranscode);
    const maxAttempts = this.retryPolicy.maxAttempts;
    let metadata: MediaMetadata | undefined;

    await this.store.ensureDirectory();
    this.logger.info(`[${token}] ${ctx.mediaType}/${ctx.quality} ${ctx.url}`);
    await notifier.notify(NotificationLevel.INFO, 'Starting download...');

    const outcome = await executeWithRetry(
      async ({ attempt, variant }) => {
        const info = metadata ?? (await this.probe(ctx.url));
        if (!metadata) {
          metadata = info;
          await notifier.notify(NotificationLevel.HIGHLIGHT, `Downloading <b>${escapeHtml(info.title)}</b>`);
        }

        const directive = pickDirective(directives, variant);
        this.logger.debug(`[${token}] Attempt ${attempt}/${maxAttempts} with ${directive.label}`);

        let reported: string | undefined;
        try {
          const result = await this.engine.fetch(ctx.url, directive, outputTemplate, (progress) =>
            notifier.progress(progress),
          );
          reported = result.filename;
        } finally {
          notifier.endProgress();
        }

        await this.sleep(this.settleDelayMs);
        const payload = await this.store.discover(token, reported);

        this.logAttempt(token, {
          attempt,
          directive,
          filePath: payload?.path ?? reported,
          size: payload?.size ?? 0,
          outcome: payload ? 'accepted' : 'empty',
        });

        if (!payload) {
          throw new EmptyPayloadError('Download produced no usable file', reported);
        }
        return { metadata: info, payload };
      },
      this.retryPolicy,
      {
        sleep: this.sleep,
        onRetry: async ({ attempt, error, decision, delayMs }) => {
          await this.store.purge(token);
          const how = decision === 'alternate' ? 'switching format' : `retrying in ${formatElapsed(delayMs)}`;
          this.logger.warning(`[${token}] Attempt ${attempt}/${maxAttempts} failed (${how}): ${error.message}`);
          await notifier.notify(NotificationLevel.WARNING, `Retry ${attempt + 1}/${maxAttempts}...`);
        },
        onGiveUp: async (error, attempts) => {
          await this.store.purge(token);
          this.logger.error(`[${token}] Gave up after ${attempts} attempt(s): ${errorMessage(error)}`);
        },
      },
    );

    this.logger.success(
      `[${token}] Fetched ${basename(outcome.payload.path)} (${formatSize(outcome.payload.size)}) in ${formatElapsed(Date.now() - startedAt)}`,
    );
    return outcome;
  }

  /**
   * Pre-flight metadata; access problems found here end the request
   */
  private async probe(url: string): Promise<MediaMetadata> {
    try {
      return await this.engine.probe(url);
    } catch (error) {
      if (error instanceof AccessDeniedError) {
        throw new AccessDeniedError(`Cannot access content: ${error.message}`, url, 'unavailable');
      }
      throw error;
    }
  }

  private logAttempt(token: string, record: DownloadAttempt): void {
    const file = record.filePath ? basename(record.filePath) : 'no file';
    this.logger.debug(
      `[${token}] Attempt ${record.attempt} [${record.directive.label}]: ${record.outcome}, ${file} (${record.size} bytes)`,
    );
  }
}
