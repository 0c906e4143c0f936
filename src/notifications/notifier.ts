export { NotificationLevel } from './notification-level.js';

import type { NotificationLevel } from './notification-level.js';

/**
 * Notifier interface for reporting the phases of one request
 */
export type Notifier = {
  /**
   * Send a notification
   * @param level - Notification level
   * @param message - Message to send (may contain Telegram HTML)
   */
  notify(level: NotificationLevel, message: string): Promise<void> | void;

  /**
   * Report transfer progress; implementations decide how often it surfaces
   * @param message - Progress line, e.g. "42.0% of 10.00MiB at 1.00MiB/s ETA 00:05"
   */
  progress(message: string): void;

  /**
   * Transfer finished (successfully or not)
   */
  endProgress(): void;
};
