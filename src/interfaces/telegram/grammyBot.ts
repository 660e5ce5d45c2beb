import { Bot } from 'grammy';

import type { TelegramBotLike } from './bot.js';

/** Wraps a grammy bot so that every reply threads under the message that triggered it. */
export function createGrammyBot(token: string): TelegramBotLike {
  const bot = new Bot(token);

  return {
    on: (event, handler) => {
      bot.on(event, async (ctx) => {
        await handler({
          chat: ctx.chat,
          message: ctx.message,
          from: ctx.from,
          reply: (text) =>
            ctx.reply(text, {
              reply_parameters: { message_id: ctx.message.message_id, allow_sending_without_reply: true },
            }),
        });
      });
    },
    catch: (handler) => {
      bot.catch(async (err) => {
        await handler(err.error);
      });
    },
    start: () => bot.start(),
    api: {
      getFile: (fileId) => bot.api.getFile(fileId),
    },
    getUsername: () => (bot.isInited() ? bot.botInfo.username : undefined),
  };
}
