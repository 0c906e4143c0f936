import { errorMessage } from '../errors/custom-errors.js';
import type { ChatAction, ChatTransport } from '../transport/chat-transport.js';
import type { RequesterId } from '../types/media.types.js';
import type { Logger } from '../utils/logger.js';
import { isAtLeast, LEVEL_ICONS, NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

export type ChatNotifierOptions = {
  minLevel?: NotificationLevel;
  /** Share of progress callbacks turned into a chat action (0..1) */
  progressSampleRate?: number;
  /** Chat action shown while the transfer runs */
  progressAction?: ChatAction;
  /** Random source, injectable for tests */
  random?: () => number;
};

/**
 * Notifier bound to one requester's chat
 *
 * Phase messages are sent as chat messages. Transfer progress is sampled into
 * a chat action.
 */
export class ChatNotifier implements Notifier {
  private readonly minLevel: NotificationLevel;
  private readonly progressSampleRate: number;
  private readonly progressAction: ChatAction;
  private readonly random: () => number;

  constructor(
    private readonly transport: ChatTransport,
    private readonly requesterId: RequesterId,
    private readonly logger: Logger,
    options: ChatNotifierOptions = {},
  ) {
    this.minLevel = options.minLevel ?? NotificationLevel.INFO;
    this.progressSampleRate = options.progressSampleRate ?? 0.1;
    this.progressAction = options.progressAction ?? 'typing';
    this.random = options.random ?? Math.random;
  }

  async notify(level: NotificationLevel, message: string): Promise<void> {
    if (!isAtLeast(level, this.minLevel)) {
      return;
    }

    try {
      await this.transport.send(this.requesterId, `${LEVEL_ICONS[level]} ${message}`);
    } catch (error) {
      this.logger.warning(`Failed to notify ${this.requesterId}: ${errorMessage(error)}`);
    }
  }

  progress(_message: string): void {
    if (this.random() >= this.progressSampleRate) {
      return;
    }

    this.transport.sendAction(this.requesterId, this.progressAction).catch((error: unknown) => {
      this.logger.debug(`Chat action failed for ${this.requesterId}: ${errorMessage(error)}`);
    });
  }

  endProgress(): void {
    // Chat actions expire on their own
  }
}
