export type MessageType = 'text' | 'photo' | 'document' | 'sticker';

/** One exported message, in the field layout the JSON and JSONL files use. */
export type ChatMessage = Readonly<{
  id: number;
  chat_id: number;
  chat_title: string;
  user_id: number | null;
  username: string | null;
  user_full_name: string | null;
  date: string;
  text: string;
  message_type: MessageType;
  has_media: boolean;
  media_description: string | null;
  image_base64: string | null;
  reply_to_message_id: number | null;
}>;

export type HistoryMedia =
  | { kind: 'none' }
  | { kind: 'photo' }
  | { kind: 'document'; mimeType: string | null }
  | { kind: 'sticker' }
  | { kind: 'other' };

export type HistorySender =
  | { kind: 'user'; id: number; username: string | null; firstName: string | null; lastName: string | null }
  | { kind: 'chat'; id: number; title: string | null }
  | { kind: 'channel'; id: number; title: string | null; username: string | null }
  | { kind: 'anonymous' };

export type ExportChat = {
  id: number;
  title: string;
};

/** A source message, normalized from either the Bot API or MTProto. */
export type HistoryMessage = {
  id: number;
  date: Date;
  text: string;
  sender: HistorySender;
  media: HistoryMedia;
  replyToMessageId: number | null;
  downloadMedia: () => Promise<Uint8Array>;
};

export type ProcessedMedia = {
  description: string | null;
  imageBase64: string | null;
};

export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}

export function messageTypeOf(media: HistoryMedia): MessageType {
  switch (media.kind) {
    case 'photo':
      return 'photo';
    case 'document':
      return 'document';
    case 'sticker':
      return 'sticker';
    case 'none':
    case 'other':
      return 'text';
    default:
      return assertNever(media);
  }
}

type SenderFields = Pick<ChatMessage, 'user_id' | 'username' | 'user_full_name'>;

function senderFields(sender: HistorySender): SenderFields {
  switch (sender.kind) {
    case 'user': {
      const fullName = [sender.firstName, sender.lastName].filter(Boolean).join(' ').trim();
      return { user_id: sender.id, username: sender.username, user_full_name: fullName || null };
    }
    case 'chat':
      return { user_id: null, username: null, user_full_name: sender.title };
    case 'channel':
      return { user_id: null, username: sender.username, user_full_name: sender.title };
    case 'anonymous':
      return { user_id: null, username: null, user_full_name: null };
    default:
      return assertNever(sender);
  }
}

export function buildChatMessage(source: HistoryMessage, chat: ExportChat, media: ProcessedMedia): ChatMessage {
  return Object.freeze({
    id: source.id,
    chat_id: chat.id,
    chat_title: chat.title,
    ...senderFields(source.sender),
    date: source.date.toISOString(),
    text: source.text,
    message_type: messageTypeOf(source.media),
    has_media: source.media.kind !== 'none',
    media_description: media.description,
    image_base64: media.imageBase64,
    reply_to_message_id: source.replyToMessageId,
  });
}
