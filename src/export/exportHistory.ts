import { isImageMimeType } from '../media/imageMime.js';
import { downscaleToBase64 } from '../media/downscale.js';
import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';
import {
  assertNever,
  buildChatMessage,
  type ChatMessage,
  type ExportChat,
  type HistoryMessage,
  type ProcessedMedia,
} from './chatMessage.js';

export const PHOTO_DESCRIPTION = 'Изображение';
export const IMAGE_DOCUMENT_DESCRIPTION = 'Документ с изображением';
export const STICKER_DESCRIPTION = 'Стикер';
export const MEDIA_FAILED_DESCRIPTION = 'Изображение (не удалось загрузить)';

const PROGRESS_EVERY = 50;

export type ExportHistoryOptions = {
  chat: ExportChat;
  messages: Iterable<HistoryMessage> | AsyncIterable<HistoryMessage>;
  logger: RuntimeLogger;
  /** Only photos are described; null keeps the generic description. */
  describeImage?: (bytes: Uint8Array) => Promise<string | null>;
  downscale?: (bytes: Uint8Array) => Promise<string>;
};

const NO_MEDIA: ProcessedMedia = { description: null, imageBase64: null };

export async function exportHistory(options: ExportHistoryOptions): Promise<ChatMessage[]> {
  const { chat, logger, describeImage, downscale = downscaleToBase64 } = options;

  const downscaleOrFail = async (message: HistoryMessage, describe: (jpeg: Uint8Array) => Promise<string>) => {
    try {
      const imageBase64 = await downscale(await message.downloadMedia());
      const description = await describe(Buffer.from(imageBase64, 'base64'));
      return { description, imageBase64 };
    } catch (err) {
      logger.warn('export.media_failed', { messageId: message.id, error: serializeError(err) });
      return { description: MEDIA_FAILED_DESCRIPTION, imageBase64: null };
    }
  };

  const processMedia = async (message: HistoryMessage): Promise<ProcessedMedia> => {
    const { media } = message;
    switch (media.kind) {
      case 'none':
      case 'other':
        return NO_MEDIA;
      case 'sticker':
        return { description: STICKER_DESCRIPTION, imageBase64: null };
      case 'photo':
        return downscaleOrFail(message, async (jpeg) => {
          if (!describeImage) return PHOTO_DESCRIPTION;
          return (await describeImage(jpeg)) ?? PHOTO_DESCRIPTION;
        });
      case 'document':
        if (!isImageMimeType(media.mimeType ?? undefined)) return NO_MEDIA;
        return downscaleOrFail(message, async () => IMAGE_DOCUMENT_DESCRIPTION);
      default:
        return assertNever(media);
    }
  };

  const collected: HistoryMessage[] = [];
  for await (const message of options.messages) {
    collected.push(message);
  }
  logger.info('export.messages_found', { chatId: chat.id, chatTitle: chat.title, count: collected.length });

  const records: ChatMessage[] = [];
  for (const [index, message] of collected.entries()) {
    try {
      const media = await processMedia(message);
      records.push(buildChatMessage(message, chat, media));
    } catch (err) {
      logger.error('export.message_failed', { messageId: message.id, error: serializeError(err) });
    }

    const processed = index + 1;
    if (processed % PROGRESS_EVERY === 0) {
      logger.info('export.progress', { processed, total: collected.length });
    }
  }

  return records;
}
