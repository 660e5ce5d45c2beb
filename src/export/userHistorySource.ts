import bigInt from 'big-integer';
import { Api, type TelegramClient } from 'telegram';

import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import type { ExportChat, HistoryMedia, HistoryMessage, HistorySender } from './chatMessage.js';

export const DEFAULT_USER_EXPORT_LIMIT = 1000;

export type UserHistoryClient = Pick<TelegramClient, 'getEntity' | 'iterMessages' | 'downloadMedia'>;

export type UserHistory = {
  chat: ExportChat;
  messages: AsyncIterable<HistoryMessage>;
};

/** Numeric references (marked ids included) become integers; anything else is a username. */
export function parseChatReference(value: string): bigInt.BigInteger | string {
  const trimmed = value.trim();
  if (/^-?\d+$/.test(trimmed)) return bigInt(trimmed);
  return trimmed;
}

/** Bot API style ids: `-100…` for channels and supergroups, `-…` for basic groups. */
export function markedEntityId(entity: unknown): number | null {
  if (entity instanceof Api.Channel) return Number(`-100${entity.id.toString()}`);
  if (entity instanceof Api.Chat) return -entity.id.toJSNumber();
  if (entity instanceof Api.User) return entity.id.toJSNumber();
  return null;
}

export function describeEntity(entity: unknown): ExportChat {
  const id = markedEntityId(entity) ?? 0;
  if (entity instanceof Api.User) {
    const title = [entity.firstName, entity.lastName].filter(Boolean).join(' ').trim();
    return { id, title: title || (entity.username ? `@${entity.username}` : 'Unknown') };
  }
  if (entity instanceof Api.Chat || entity instanceof Api.Channel) {
    return { id, title: entity.title || 'Unknown' };
  }
  return { id, title: 'Unknown' };
}

export function mapUserSender(sender: unknown): HistorySender {
  if (sender instanceof Api.User) {
    return {
      kind: 'user',
      id: sender.id.toJSNumber(),
      username: sender.username ?? null,
      firstName: sender.firstName ?? null,
      lastName: sender.lastName ?? null,
    };
  }
  if (sender instanceof Api.Channel) {
    const id = Number(`-100${sender.id.toString()}`);
    if (sender.megagroup) return { kind: 'chat', id, title: sender.title || null };
    return { kind: 'channel', id, title: sender.title || null, username: sender.username ?? null };
  }
  if (sender instanceof Api.Chat) {
    return { kind: 'chat', id: -sender.id.toJSNumber(), title: sender.title || null };
  }
  return { kind: 'anonymous' };
}

export function mapUserMedia(media: Api.TypeMessageMedia | undefined): HistoryMedia {
  if (!media) return { kind: 'none' };
  if (media instanceof Api.MessageMediaPhoto) return { kind: 'photo' };
  if (media instanceof Api.MessageMediaDocument) {
    const document = media.document;
    if (!(document instanceof Api.Document)) return { kind: 'document', mimeType: null };
    if (document.attributes.some((attribute) => attribute instanceof Api.DocumentAttributeSticker)) {
      return { kind: 'sticker' };
    }
    return { kind: 'document', mimeType: document.mimeType };
  }
  return { kind: 'other' };
}

export function mapUserMessage(message: Api.Message, client: Pick<UserHistoryClient, 'downloadMedia'>): HistoryMessage {
  const replyTo = message.replyTo instanceof Api.MessageReplyHeader ? message.replyTo.replyToMsgId : undefined;

  return {
    id: message.id,
    date: new Date(message.date * 1000),
    text: message.message ?? '',
    sender: mapUserSender(message.sender),
    media: mapUserMedia(message.media),
    replyToMessageId: replyTo ?? null,
    downloadMedia: async () => {
      const result = await client.downloadMedia(message);
      if (!Buffer.isBuffer(result)) {
        throw new Error(`Media of message ${message.id} could not be downloaded.`);
      }
      return result;
    },
  };
}

export async function loadUserHistory(options: {
  client: UserHistoryClient;
  chat: string;
  limit: number;
  logger: RuntimeLogger;
}): Promise<UserHistory> {
  const { client, limit, logger } = options;

  const entity = await client.getEntity(parseChatReference(options.chat));
  const chat = describeEntity(entity);
  logger.info('export.chat_resolved', { chatId: chat.id, chatTitle: chat.title, limit });

  async function* iterate(): AsyncGenerator<HistoryMessage> {
    for await (const message of client.iterMessages(entity, { limit })) {
      if (!(message instanceof Api.Message)) continue;
      yield mapUserMessage(message, client);
    }
  }

  return { chat, messages: iterate() };
}
