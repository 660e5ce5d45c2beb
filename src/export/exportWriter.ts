import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ChatMessage } from './chatMessage.js';

export const EMPTY_MESSAGE_CONTENT = 'Пустое сообщение';

export type VectorRecord = {
  content: string;
  metadata: {
    message_id: number;
    chat_id: number;
    chat_title: string;
    user_id: number | null;
    username: string | null;
    user_full_name: string | null;
    date: string;
    message_type: ChatMessage['message_type'];
    has_media: boolean;
    reply_to_message_id: number | null;
  };
  image_base64?: string;
};

export type ExportKind = 'user' | 'bot';

export type ExportFilenames = {
  json: string;
  jsonl: string;
};

const pad = (value: number) => String(value).padStart(2, '0');

/** Local wall-clock stamp, `YYYYMMDD_HHMMSS`. */
export function formatExportTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function buildExportFilenames(kind: ExportKind, now: Date, dir = '.'): ExportFilenames {
  const stamp = formatExportTimestamp(now);
  if (kind === 'bot') {
    return {
      json: path.join(dir, `bot_export_${stamp}.json`),
      jsonl: path.join(dir, `bot_vector_db_${stamp}.jsonl`),
    };
  }
  return {
    json: path.join(dir, `chat_export_${stamp}.json`),
    jsonl: path.join(dir, `vector_db_data_${stamp}.jsonl`),
  };
}

export function buildVectorRecord(message: ChatMessage): VectorRecord {
  const parts: string[] = [];
  if (message.text) parts.push(`Текст: ${message.text}`);
  if (message.media_description) parts.push(`Медиа: ${message.media_description}`);

  return {
    content: parts.length > 0 ? parts.join(' | ') : EMPTY_MESSAGE_CONTENT,
    metadata: {
      message_id: message.id,
      chat_id: message.chat_id,
      chat_title: message.chat_title,
      user_id: message.user_id,
      username: message.username,
      user_full_name: message.user_full_name,
      date: message.date,
      message_type: message.message_type,
      has_media: message.has_media,
      reply_to_message_id: message.reply_to_message_id,
    },
    ...(message.image_base64 ? { image_base64: message.image_base64 } : {}),
  };
}

export async function writeJsonExport(filePath: string, messages: readonly ChatMessage[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(messages, null, 2) + '\n', 'utf8');
}

export async function writeVectorJsonl(filePath: string, messages: readonly ChatMessage[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const lines = messages.map((message) => JSON.stringify(buildVectorRecord(message)) + '\n');
  await writeFile(filePath, lines.join(''), 'utf8');
}
