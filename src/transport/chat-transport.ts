import type { RequesterId } from '../types/media.types.js';

/**
 * Upload channel: media-type specific or the generic document fallback
 */
export type MediaKind = 'video' | 'audio' | 'document';

/**
 * Chat actions shown while the bot works ("uploading video...")
 */
export type ChatAction = 'typing' | 'upload_video' | 'upload_document';

/**
 * Reply keyboard to show with a message, or an instruction to hide it
 */
export type ReplyKeyboard = { rows: string[][] } | { remove: true };

export type SendMediaOptions = {
  /** Track title for audio uploads */
  title?: string;
};

/**
 * Outbound side of the chat platform. Messages are HTML formatted.
 */
export type ChatTransport = {
  send(requesterId: RequesterId, text: string, keyboard?: ReplyKeyboard): Promise<void>;

  sendMedia(
    requesterId: RequesterId,
    kind: MediaKind,
    filePath: string,
    caption: string,
    options?: SendMediaOptions,
  ): Promise<void>;

  sendAction(requesterId: RequesterId, action: ChatAction): Promise<void>;
};
