import { errorMessage } from '../errors/custom-errors.js';
import { type Logger, logger as defaultLogger } from '../utils/logger.js';
import type { NotificationLevel } from './notification-level.js';
import type { Notifier } from './notifier.js';

/**
 * Broadcasts every notification to a fixed set of notifiers.
 * A failing notifier is logged and never stops the others.
 */
export class CompositeNotifier implements Notifier {
  constructor(
    private readonly notifiers: readonly Notifier[],
    private readonly logger: Logger = defaultLogger,
  ) {}

  async notify(level: NotificationLevel, message: string): Promise<void> {
    await Promise.all(
      this.notifiers.map(async (notifier) => {
        try {
          await notifier.notify(level, message);
        } catch (error) {
          this.logger.warning(`Notifier error: ${errorMessage(error)}`);
        }
      }),
    );
  }

  progress(message: string): void {
    this.each('Progress', (notifier) => notifier.progress(message));
  }

  endProgress(): void {
    this.each('End progress', (notifier) => notifier.endProgress());
  }

  private each(label: string, call: (notifier: Notifier) => void): void {
    for (const notifier of this.notifiers) {
      try {
        call(notifier);
      } catch (error) {
        this.logger.warning(`${label} error: ${errorMessage(error)}`);
      }
    }
  }
}
