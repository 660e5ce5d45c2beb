import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions/index.js';

import type { TelegramUserConfig } from '../../runtime/appConfig.js';

export const SESSION_NOT_AUTHORIZED_MESSAGE =
  'Telegram session is not authorized. Sign in once to create the session file.';

export type UserClient = {
  client: TelegramClient;
  session: StringSession;
};

/** An absent session file means "not signed in yet". */
export async function readSessionString(filePath: string): Promise<string> {
  try {
    return (await readFile(filePath, 'utf8')).trim();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return '';
    throw err;
  }
}

export async function writeSessionString(filePath: string, value: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${value}\n`, { encoding: 'utf8', mode: 0o600 });
}

export function createUserClient(config: TelegramUserConfig, sessionString: string): UserClient {
  const session = new StringSession(sessionString);
  const client = new TelegramClient(session, config.apiId, config.apiHash, {
    connectionRetries: 5,
  });
  return { client, session };
}

export async function connectAuthorized(client: TelegramClient): Promise<void> {
  await client.connect();
  if (!(await client.checkAuthorization())) {
    throw new Error(SESSION_NOT_AUTHORIZED_MESSAGE);
  }
}
