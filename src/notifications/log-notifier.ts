import type { Logger } from '../utils/logger.js';
import { isAtLeast, NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

/**
 * Mirrors request notifications into the process log
 */
export class LogNotifier implements Notifier {
  private lastProgress?: string;

  constructor(
    private readonly logger: Logger,
    private readonly minLevel: NotificationLevel = NotificationLevel.INFO,
  ) {}

  notify(level: NotificationLevel, message: string): void {
    if (!isAtLeast(level, this.minLevel)) {
      return;
    }

    // Chat markup is noise in the log
    const plain = message.replace(/<[^>]+>/g, '');

    switch (level) {
      case NotificationLevel.DEBUG:
        this.logger.debug(plain);
        break;
      case NotificationLevel.INFO:
        this.logger.info(plain);
        break;
      case NotificationLevel.SUCCESS:
        this.logger.success(plain);
        break;
      case NotificationLevel.WARNING:
        this.logger.warning(plain);
        break;
      case NotificationLevel.ERROR:
        this.logger.error(plain);
        break;
      case NotificationLevel.HIGHLIGHT:
        this.logger.highlight(plain);
        break;
    }
  }

  progress(message: string): void {
    this.lastProgress = message;
  }

  /**
   * Log the final progress line once instead of every update
   */
  endProgress(): void {
    if (this.lastProgress) {
      this.logger.debug(this.lastProgress);
      this.lastProgress = undefined;
    }
  }
}
