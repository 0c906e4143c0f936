import { Bot, GrammyError, HttpError } from 'grammy';
import { errorMessage } from '../errors/custom-errors.js';
import type { RequesterId } from '../types/media.types.js';
import type { Logger } from '../utils/logger.js';
import type { BotApi } from './grammy-transport.js';

export type TextHandler = (requesterId: RequesterId, text: string) => Promise<void>;

/**
 * Inbound side of the chat platform plus the API client used to answer
 */
export type ChatBot = {
  readonly api: BotApi;
  onText(handler: TextHandler): void;
  /** Resolves once polling has stopped */
  start(): Promise<void>;
  stop(): Promise<void>;
};

/**
 * Long-polling grammy bot
 */
export function createGrammyBot(token: string, logger: Logger): ChatBot {
  const bot = new Bot(token);

  bot.catch((err) => {
    const e = err.error;
    if (e instanceof GrammyError) {
      logger.error(`Error in request for update ${err.ctx.update.update_id}: ${e.description}`);
    } else if (e instanceof HttpError) {
      logger.error(`Could not contact Telegram: ${errorMessage(e.error)}`);
    } else {
      logger.error(`Error handling update ${err.ctx.update.update_id}: ${errorMessage(e)}`);
    }
  });

  return {
    api: bot.api,
    onText(handler) {
      bot.on('message:text', async (ctx) => {
        await handler(ctx.chat.id, ctx.message.text);
      });
    },
    start: () =>
      bot.start({
        onStart: (botInfo) => logger.success(`Bot @${botInfo.username} is polling for messages`),
      }),
    stop: () => bot.stop(),
  };
}
