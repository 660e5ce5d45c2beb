import type { TelegramFileApi } from './types.js';

export type DownloadedTelegramFile = {
  bytes: Uint8Array;
};

export type DownloadTelegramFileInput = {
  api: TelegramFileApi;
  token: string;
  fileId: string;
  fetchImpl?: typeof fetch;
};

export async function downloadTelegramFile(input: DownloadTelegramFileInput): Promise<DownloadedTelegramFile> {
  const { api, token, fileId, fetchImpl = fetch } = input;

  const file = await api.getFile(fileId);
  const filePath = file.file_path;
  if (!filePath) {
    throw new Error('Telegram file path is missing from getFile response.');
  }

  const response = await fetchImpl(`https://api.telegram.org/file/bot${token}/${filePath}`);
  if (!response.ok) {
    throw new Error(`Failed to download Telegram file (${response.status}).`);
  }

  return { bytes: new Uint8Array(await response.arrayBuffer()) };
}
