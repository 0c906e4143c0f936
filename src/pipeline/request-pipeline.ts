import type { DeliveryOrchestrator, DeliveryOutcome } from '../delivery/delivery-orchestrator.js';
import type { DownloadOrchestrator } from '../downloader/download-orchestrator.js';
import type { Notifier } from '../notifications/notifier.js';
import type { RequestContext } from '../types/media.types.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import { formatElapsed } from '../utils/time-utils.js';

export type SentOutcome = Extract<DeliveryOutcome, { status: 'sent' }>;

/**
 * Fetch then deliver: one accepted request from URL to chat
 */
export class RequestPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly downloader: DownloadOrchestrator,
    private readonly delivery: DeliveryOrchestrator,
    logger?: Logger,
  ) {
    this.logger = logger ?? defaultLogger.child('pipeline');
  }

  /**
   * @throws The download error, or the delivery error when the upload failed
   */
  async run(ctx: RequestContext, notifier: Notifier): Promise<SentOutcome> {
    const startedAt = Date.now();
    const { metadata, payload } = await this.downloader.fetch(ctx, notifier);
    const outcome = await this.delivery.deliver(ctx, metadata, payload, notifier);

    if (outcome.status === 'failed') {
      throw outcome.error;
    }

    this.logger.success(
      `Delivered "${metadata.title}" to ${ctx.requesterId} as ${outcome.channel} in ${formatElapsed(Date.now() - startedAt)}`,
    );
    return outcome;
  }
}
