import type { NotificationLevel, Notifier } from '../notifications/notifier.js';

/**
 * Notifier that keeps everything it is told
 */
export class RecordingNotifier implements Notifier {
  readonly notifications: Array<{ level: NotificationLevel; message: string }> = [];
  readonly progressLines: string[] = [];
  endProgressCount = 0;

  notify(level: NotificationLevel, message: string): void {
    this.notifications.push({ level, message });
  }

  progress(message: string): void {
    this.progressLines.push(message);
  }

  endProgress(): void {
    this.endProgressCount++;
  }

  messages(): string[] {
    return this.notifications.map((n) => n.message);
  }
}
