export type { ChatNotifierOptions } from './chat-notifier.js';
export { ChatNotifier } from './chat-notifier.js';
export { CompositeNotifier } from './composite-notifier.js';
export { LogNotifier } from './log-notifier.js';
export { NotificationLevel } from './notification-level.js';
export type { Notifier } from './notifier.js';
