import { readFile } from 'node:fs/promises';

export const DEFAULT_SYSTEM_INSTRUCTIONS = [
  'Ты «Пояснительная бригада», бот в групповом чате Telegram.',
  'Ты объясняешь мемы, шутки и непонятные сообщения: в чем юмор и какие отсылки нужно знать.',
  'Отвечай на русском языке, кратко и понятно, без лишних вступлений.',
].join('\n');

export type SystemInstructions = {
  text: string;
  source: 'file' | 'default';
};

const isMissingFileError = (err: unknown): boolean => {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'EISDIR';
};

/** A missing or blank file falls back to the built-in instructions; other read errors propagate. */
export async function loadSystemInstructions(filePath: string): Promise<SystemInstructions> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFileError(err)) {
      return { text: DEFAULT_SYSTEM_INSTRUCTIONS, source: 'default' };
    }
    throw err;
  }

  const text = raw.trim();
  if (!text) {
    return { text: DEFAULT_SYSTEM_INSTRUCTIONS, source: 'default' };
  }
  return { text, source: 'file' };
}
