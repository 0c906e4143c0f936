import { type Api, InputFile, Keyboard } from 'grammy';
import type { ReplyKeyboardRemove } from 'grammy/types';
import type { RequesterId } from '../types/media.types.js';
import type { ChatAction, ChatTransport, MediaKind, ReplyKeyboard, SendMediaOptions } from './chat-transport.js';

/**
 * Bot API methods the transport calls
 */
export type BotApi = Pick<Api, 'sendMessage' | 'sendVideo' | 'sendAudio' | 'sendDocument' | 'sendChatAction'>;

function toReplyMarkup(keyboard: ReplyKeyboard): Keyboard | ReplyKeyboardRemove {
  if ('remove' in keyboard) {
    return { remove_keyboard: true };
  }
  return Keyboard.from(keyboard.rows).resized();
}

/**
 * ChatTransport on top of the grammy Bot API client
 */
export class GrammyTransport implements ChatTransport {
  constructor(private readonly api: BotApi) {}

  async send(requesterId: RequesterId, text: string, keyboard?: ReplyKeyboard): Promise<void> {
    await this.api.sendMessage(requesterId, text, {
      parse_mode: 'HTML',
      ...(keyboard ? { reply_markup: toReplyMarkup(keyboard) } : {}),
    });
  }

  async sendMedia(
    requesterId: RequesterId,
    kind: MediaKind,
    filePath: string,
    caption: string,
    options: SendMediaOptions = {},
  ): Promise<void> {
    const file = new InputFile(filePath);

    switch (kind) {
      case 'video':
        await this.api.sendVideo(requesterId, file, { caption, parse_mode: 'HTML', supports_streaming: true });
        return;
      case 'audio':
        await this.api.sendAudio(requesterId, file, { caption, parse_mode: 'HTML', title: options.title });
        return;
      case 'document':
        await this.api.sendDocument(requesterId, file, { caption, parse_mode: 'HTML' });
        return;
    }
  }

  async sendAction(requesterId: RequesterId, action: ChatAction): Promise<void> {
    await this.api.sendChatAction(requesterId, action);
  }
}
