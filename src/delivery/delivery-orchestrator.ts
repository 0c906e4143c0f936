import type { PayloadStore } from '../downloader/payload-store.js';
import { DeliveryError, EmptyPayloadError, errorMessage } from '../errors/custom-errors.js';
import type { Notifier } from '../notifications/notifier.js';
import { NotificationLevel } from '../notifications/notifier.js';
import type { ChatTransport, MediaKind } from '../transport/chat-transport.js';
import { MediaType } from '../types/media-type.js';
import type { MediaMetadata, RequestContext, StoredPayload } from '../types/media.types.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/time-utils.js';
import { buildCaption } from './caption.js';

export type DeliveryOutcome =
  | { status: 'sent'; channel: MediaKind; attempts: number }
  | { status: 'failed'; error: DeliveryError | EmptyPayloadError };

export type DeliveryOrchestratorOptions = {
  transport: ChatTransport;
  store: PayloadStore;
  /** Uploads through the media channel before falling back to a document */
  maxAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

/** Telegram cuts audio titles longer than this */
const AUDIO_TITLE_LENGTH = 64;

/**
 * Uploads a verified payload to the requester and deletes it afterwards
 */
export class DeliveryOrchestrator {
  private readonly transport: ChatTransport;
  private readonly store: PayloadStore;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: DeliveryOrchestratorOptions) {
    this.transport = options.transport;
    this.store = options.store;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.logger = options.logger ?? defaultLogger.child('delivery');
    this.sleep = options.sleep ?? defaultSleep;
  }

  async deliver(
    ctx: RequestContext,
    metadata: MediaMetadata,
    payload: StoredPayload,
    notifier: Notifier,
  ): Promise<DeliveryOutcome> {
    try {
      const size = await this.store.verify(payload.path);
      if (size === undefined) {
        return {
          status: 'failed',
          error: new EmptyPayloadError('Downloaded file is missing or too small', payload.path),
        };
      }

      const caption = buildCaption(metadata, size);
      const channel: MediaKind = ctx.mediaType === MediaType.AUDIO ? 'audio' : 'video';
      const options = channel === 'audio' ? { title: metadata.title.slice(0, AUDIO_TITLE_LENGTH) } : undefined;

      await notifier.notify(NotificationLevel.INFO, 'Uploading file...');
      this.transport
        .sendAction(ctx.requesterId, channel === 'audio' ? 'upload_document' : 'upload_video')
        .catch((error: unknown) => this.logger.debug(`Chat action failed: ${errorMessage(error)}`));

      let lastError: unknown;

      for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
        try {
          // biome-ignore lint/performance/noAwaitInLoops: Upload attempts are sequential
          await this.transport.sendMedia(ctx.requesterId, channel, payload.path, caption, options);
          await notifier.notify(NotificationLevel.SUCCESS, 'Upload successful!');
          return { status: 'sent', channel, attempts: attempt };
        } catch (error) {
          lastError = error;
          this.logger.warning(`Upload attempt ${attempt} as ${channel} failed: ${errorMessage(error)}`);

          if (attempt < this.maxAttempts) {
            await notifier.notify(NotificationLevel.WARNING, `Upload failed, retrying... (attempt ${attempt + 1})`);
            await this.sleep(this.retryDelayMs);
          }
        }
      }

      try {
        await this.transport.sendMedia(ctx.requesterId, 'document', payload.path, caption);
        await notifier.notify(NotificationLevel.SUCCESS, 'Upload completed as document!');
        return { status: 'sent', channel: 'document', attempts: this.maxAttempts + 1 };
      } catch (error) {
        this.logger.error(`Document upload failed: ${errorMessage(error)}`);
        return {
          status: 'failed',
          error: new DeliveryError(`Upload failed: ${errorMessage(lastError).slice(0, 100)}`, lastError),
        };
      }
    } finally {
      await this.store.remove(payload.path);
    }
  }
}
