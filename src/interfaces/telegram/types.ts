// Structural subsets of the Bot API objects; grammy's own types satisfy them.

export type TelegramPhotoSize = {
  file_id: string;
  file_unique_id: string;
  width: number;
  height: number;
  file_size?: number;
};

export type TelegramDocument = {
  file_id: string;
  file_unique_id: string;
  file_name?: string;
  mime_type?: string;
  file_size?: number;
};

export type TelegramSticker = {
  file_id: string;
  file_unique_id: string;
  emoji?: string;
};

export type TelegramUser = {
  id: number;
  is_bot?: boolean;
  first_name: string;
  last_name?: string;
  username?: string;
};

export type TelegramChat = {
  id: number;
  type: string;
  title?: string;
  username?: string;
  first_name?: string;
  last_name?: string;
};

export type TelegramMessage = {
  message_id: number;
  date?: number;
  chat?: TelegramChat;
  from?: TelegramUser;
  sender_chat?: TelegramChat;
  text?: string;
  caption?: string;
  photo?: TelegramPhotoSize[];
  document?: TelegramDocument;
  sticker?: TelegramSticker;
  reply_to_message?: TelegramMessage;
};

export type TelegramFile = {
  file_id?: string;
  file_path?: string;
};

export type TelegramFileApi = {
  getFile: (fileId: string) => Promise<TelegramFile>;
};
