import { stat } from 'node:fs/promises';
import type { ChatAction, ChatTransport, MediaKind, ReplyKeyboard, SendMediaOptions } from '../transport/chat-transport.js';
import type { RequesterId } from '../types/media.types.js';

export type SentMessage = { requesterId: RequesterId; text: string; keyboard?: ReplyKeyboard };

export type SentMedia = {
  requesterId: RequesterId;
  kind: MediaKind;
  filePath: string;
  caption: string;
  options?: SendMediaOptions;
  /** Size of the file at upload time */
  size: number;
};

/**
 * In-memory chat transport recording everything the bot sends
 */
export class FakeTransport implements ChatTransport {
  readonly messages: SentMessage[] = [];
  readonly media: SentMedia[] = [];
  readonly actions: Array<{ requesterId: RequesterId; action: ChatAction }> = [];

  /** Upload failures to raise, consumed per channel in call order */
  private readonly failures = new Map<MediaKind, Error[]>();

  failNextUploads(kind: MediaKind, ...errors: Error[]): void {
    this.failures.set(kind, [...(this.failures.get(kind) ?? []), ...errors]);
  }

  async send(requesterId: RequesterId, text: string, keyboard?: ReplyKeyboard): Promise<void> {
    this.messages.push({ requesterId, text, keyboard });
  }

  async sendMedia(
    requesterId: RequesterId,
    kind: MediaKind,
    filePath: string,
    caption: string,
    options?: SendMediaOptions,
  ): Promise<void> {
    const { size } = await stat(filePath);
    const pending = this.failures.get(kind);
    const failure = pending?.shift();
    if (failure) {
      throw failure;
    }
    this.media.push({ requesterId, kind, filePath, caption, options, size });
  }

  async sendAction(requesterId: RequesterId, action: ChatAction): Promise<void> {
    this.actions.push({ requesterId, action });
  }

  textsFor(requesterId: RequesterId): string[] {
    return this.messages.filter((m) => m.requesterId === requesterId).map((m) => m.text);
  }
}
