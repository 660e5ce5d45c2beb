import 'dotenv/config';

import process from 'node:process';
import { Api } from 'telegram';

import { loadTelegramUserConfig } from '../../runtime/appConfig.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import { createRuntimeLogger, serializeError } from '../../utils/runtimeLogger.js';
import { createUserClient, readSessionString, writeSessionString } from '../telegram/userSession.js';
import { createPrompter } from './prompt.js';

const logDir = process.env.LOG_DIR || 'logs';

const run = async () => {
  const config = loadTelegramUserConfig(process.env);
  const logger = createRuntimeLogger({ logDir, component: 'auth.session' });
  const prompter = createPrompter();
  const { client, session } = createUserClient(config, await readSessionString(config.sessionFile));

  try {
    await client.start({
      phoneNumber: async () => config.phone,
      phoneCode: () => prompter.ask('Введите код из Telegram: '),
      password: (hint) => prompter.ask(hint ? `Пароль 2FA (подсказка: ${hint}): ` : 'Пароль 2FA: '),
      onError: (err) => {
        logger.error('auth.sign_in_failed', { error: serializeError(err) });
      },
    });

    await writeSessionString(config.sessionFile, session.save());
    logger.info('auth.session_saved', { sessionFile: config.sessionFile });

    const me = await client.getMe();
    const who = me instanceof Api.User ? (me.username ? `@${me.username}` : (me.firstName ?? String(me.id))) : 'unknown';
    console.log(`Сессия сохранена в ${config.sessionFile} (${who})`);
  } finally {
    await client.destroy();
    prompter.close();
    await logger.flush();
  }
};

run().catch((err) => {
  reportStartupError(err, { mode: 'auth-session', logDir });
  process.exit(1);
});
