import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import { serializeError } from '../utils/runtimeLogger.js';
import { downloadTelegramFile } from '../interfaces/telegram/telegramFiles.js';
import type { TelegramChat, TelegramFileApi, TelegramMessage } from '../interfaces/telegram/types.js';
import type { ExportChat, HistoryMedia, HistoryMessage, HistorySender } from './chatMessage.js';

export const UNKNOWN_CHAT_TITLE = 'Unknown Chat';

export type TelegramUpdateLike = {
  update_id: number;
  message?: TelegramMessage;
};

export type BotHistoryApi = TelegramFileApi & {
  getChat: (chatId: number) => Promise<Pick<TelegramChat, 'title'>>;
  getUpdates: (params: { limit: number; timeout: number }) => Promise<TelegramUpdateLike[]>;
};

type BotHistoryDeps = {
  downloadTelegramFile: typeof downloadTelegramFile;
};

export type LoadBotHistoryOptions = {
  api: BotHistoryApi;
  token: string;
  chatId: number;
  limit: number;
  logger: RuntimeLogger;
  deps?: Partial<BotHistoryDeps>;
};

export type BotHistory = {
  chat: ExportChat;
  messages: HistoryMessage[];
};

export function mapBotSender(message: TelegramMessage): HistorySender {
  if (message.from) {
    return {
      kind: 'user',
      id: message.from.id,
      username: message.from.username ?? null,
      firstName: message.from.first_name || null,
      lastName: message.from.last_name ?? null,
    };
  }
  const senderChat = message.sender_chat;
  if (senderChat?.type === 'channel') {
    return { kind: 'channel', id: senderChat.id, title: senderChat.title ?? null, username: senderChat.username ?? null };
  }
  if (senderChat) {
    return { kind: 'chat', id: senderChat.id, title: senderChat.title ?? null };
  }
  return { kind: 'anonymous' };
}

export function mapBotMedia(message: TelegramMessage): HistoryMedia {
  if (message.photo && message.photo.length > 0) return { kind: 'photo' };
  if (message.document) return { kind: 'document', mimeType: message.document.mime_type ?? null };
  if (message.sticker) return { kind: 'sticker' };
  return { kind: 'none' };
}

function mediaFileId(message: TelegramMessage): string | null {
  const photo = message.photo;
  if (photo && photo.length > 0) return photo[photo.length - 1].file_id;
  return message.document?.file_id ?? null;
}

export function mapBotMessage(
  message: TelegramMessage,
  download: (fileId: string) => Promise<Uint8Array>,
): HistoryMessage {
  return {
    id: message.message_id,
    date: new Date((message.date ?? 0) * 1000),
    text: message.text ?? message.caption ?? '',
    sender: mapBotSender(message),
    media: mapBotMedia(message),
    replyToMessageId: message.reply_to_message?.message_id ?? null,
    downloadMedia: async () => {
      const fileId = mediaFileId(message);
      if (!fileId) {
        throw new Error(`Message ${message.message_id} has no downloadable media.`);
      }
      return download(fileId);
    },
  };
}

/**
 * Reads what is still pending in the bot's update buffer. Telegram keeps unconfirmed updates for a
 * day at most, and only while no other process is polling the same bot.
 */
export async function loadBotHistory(options: LoadBotHistoryOptions): Promise<BotHistory> {
  const { api, token, chatId, limit, logger } = options;
  const downloadTelegramFileImpl = options.deps?.downloadTelegramFile ?? downloadTelegramFile;

  let title = UNKNOWN_CHAT_TITLE;
  try {
    const chat = await api.getChat(chatId);
    title = chat.title ?? UNKNOWN_CHAT_TITLE;
  } catch (err) {
    logger.warn('export.get_chat_failed', { chatId, error: serializeError(err) });
  }

  const updates = await api.getUpdates({ limit, timeout: 1 });
  const download = async (fileId: string) => {
    const file = await downloadTelegramFileImpl({ api, token, fileId });
    return file.bytes;
  };

  const messages = updates
    .map((update) => update.message)
    .filter((message): message is TelegramMessage => message?.chat?.id === chatId)
    .map((message) => mapBotMessage(message, download));

  logger.info('export.updates_read', { chatId, updates: updates.length, messages: messages.length });
  return { chat: { id: chatId, title }, messages };
}
