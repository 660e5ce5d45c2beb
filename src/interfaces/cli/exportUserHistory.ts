import 'dotenv/config';

import process from 'node:process';

import { createExplainer, createOpenAIChatClient } from '../../explain/explainer.js';
import { DEFAULT_SYSTEM_INSTRUCTIONS } from '../../explain/systemInstructions.js';
import { exportHistory } from '../../export/exportHistory.js';
import { buildExportFilenames, writeJsonExport, writeVectorJsonl } from '../../export/exportWriter.js';
import { DEFAULT_USER_EXPORT_LIMIT, loadUserHistory } from '../../export/userHistorySource.js';
import { ConfigError, loadUserExportConfig, parseExportLimit } from '../../runtime/appConfig.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import { createRuntimeLogger } from '../../utils/runtimeLogger.js';
import { connectAuthorized, createUserClient, readSessionString } from '../telegram/userSession.js';
import { createPrompter } from './prompt.js';

const logDir = process.env.LOG_DIR || 'logs';

const run = async () => {
  const config = loadUserExportConfig(process.env);
  const logger = createRuntimeLogger({ logDir: config.logDir, component: 'export.user' });
  const prompter = createPrompter();
  const { client } = createUserClient(config, await readSessionString(config.sessionFile));

  try {
    const chat = config.chat ?? (await prompter.ask('Введите username чата (например, @chatname) или ID: '));
    if (!chat) throw new ConfigError('Missing CHAT_ID: no chat given');
    const limit = parseExportLimit(
      await prompter.ask(`Количество сообщений для экспорта (по умолчанию ${DEFAULT_USER_EXPORT_LIMIT}): `),
      DEFAULT_USER_EXPORT_LIMIT,
    );

    await connectAuthorized(client);

    // Image descriptions are optional; without a key photos keep the generic label.
    const explainer = config.openaiApiKey
      ? createExplainer({
          client: createOpenAIChatClient(config.openaiApiKey),
          systemInstructions: DEFAULT_SYSTEM_INSTRUCTIONS,
          model: config.model,
          logger: logger.child('explainer'),
        })
      : null;

    const history = await loadUserHistory({ client, chat, limit, logger });
    const messages = await exportHistory({
      chat: history.chat,
      messages: history.messages,
      logger,
      describeImage: explainer ? (bytes) => explainer.describeImage(bytes) : undefined,
    });

    if (messages.length === 0) {
      console.log('Сообщения не найдены');
      return;
    }

    const files = buildExportFilenames('user', new Date(), config.exportDir);
    await writeJsonExport(files.json, messages);
    await writeVectorJsonl(files.jsonl, messages);
    logger.info('export.written', { count: messages.length, json: files.json, jsonl: files.jsonl });

    const withMedia = messages.filter((message) => message.has_media).length;
    console.log(`Чат: ${history.chat.title} (${history.chat.id})`);
    console.log(`Экспортировано сообщений: ${messages.length}, из них с медиа: ${withMedia}`);
    console.log(`- ${files.json}`);
    console.log(`- ${files.jsonl}`);
  } finally {
    await client.destroy();
    prompter.close();
    await logger.flush();
  }
};

run().catch((err) => {
  reportStartupError(err, { mode: 'export-user', logDir });
  process.exit(1);
});
