import { isImageMimeType } from '../../media/imageMime.js';
import { hasMeaningfulText, stripTriggerPhrases } from './triggers.js';
import type { TelegramMessage } from './types.js';

export type ContentOrigin = 'message' | 'reply';

export type ImageAttachmentKind = 'photo' | 'document';

/**
 * What the bot decided to explain, before anything is downloaded.
 *
 * Precedence, first match wins:
 *   1. photo on the message          2. photo on the replied-to message
 *   3. image document on the message 4. image document on the replied-to message
 *   5. message text (trigger phrases removed)  6. replied-to message text
 */
export type ContentSelection =
  | {
      kind: 'image';
      origin: ContentOrigin;
      attachment: ImageAttachmentKind;
      fileId: string;
      mimeType?: string;
    }
  | { kind: 'text'; origin: ContentOrigin; text: string }
  | { kind: 'none' };

export type ResolvedContent =
  | {
      kind: 'image';
      origin: ContentOrigin;
      attachment: ImageAttachmentKind;
      bytes: Uint8Array;
      mimeType?: string;
    }
  | { kind: 'text'; origin: ContentOrigin; text: string }
  | { kind: 'none'; reason: 'not_found' }
  | { kind: 'none'; reason: 'download_failed'; error: unknown };

export type SelectContentInput = {
  message: TelegramMessage;
  /**
   * Candidate text of the triggering message: the arguments of `/explain`, or the whole text or
   * caption of a trigger message.
   */
  text?: string;
  triggerPhrases: readonly string[];
};

type PhotoSelection = Extract<ContentSelection, { kind: 'image' }>;

// Telegram orders photo sizes from smallest to largest.
function selectPhoto(message: TelegramMessage | undefined, origin: ContentOrigin): PhotoSelection | null {
  const sizes = message?.photo;
  if (!sizes || sizes.length === 0) return null;
  const largest = sizes[sizes.length - 1];
  return {
    kind: 'image',
    origin,
    attachment: 'photo',
    fileId: largest.file_id,
  };
}

function selectImageDocument(message: TelegramMessage | undefined, origin: ContentOrigin): PhotoSelection | null {
  const document = message?.document;
  if (!document || !isImageMimeType(document.mime_type)) return null;
  return {
    kind: 'image',
    origin,
    attachment: 'document',
    fileId: document.file_id,
    mimeType: document.mime_type,
  };
}

export function selectContent(input: SelectContentInput): ContentSelection {
  const { message, triggerPhrases } = input;
  const reply = message.reply_to_message;

  const image =
    selectPhoto(message, 'message') ??
    selectPhoto(reply, 'reply') ??
    selectImageDocument(message, 'message') ??
    selectImageDocument(reply, 'reply');
  if (image) return image;

  const ownText = stripTriggerPhrases(input.text ?? '', triggerPhrases);
  if (ownText && hasMeaningfulText(ownText)) {
    return { kind: 'text', origin: 'message', text: ownText };
  }

  const replyText = reply?.text?.trim();
  if (replyText) {
    return { kind: 'text', origin: 'reply', text: replyText };
  }

  return { kind: 'none' };
}

export type DownloadImage = (fileId: string) => Promise<Uint8Array>;

/** Downloads the selected attachment. A failed download degrades to "nothing found"; there are no retries. */
export async function resolveContent(selection: ContentSelection, download: DownloadImage): Promise<ResolvedContent> {
  switch (selection.kind) {
    case 'none':
      return { kind: 'none', reason: 'not_found' };
    case 'text':
      return selection;
    case 'image': {
      try {
        const bytes = await download(selection.fileId);
        return {
          kind: 'image',
          origin: selection.origin,
          attachment: selection.attachment,
          bytes,
          mimeType: selection.mimeType,
        };
      } catch (error) {
        return { kind: 'none', reason: 'download_failed', error };
      }
    }
  }
}
