import 'dotenv/config';

import process from 'node:process';
import { Api } from 'grammy';

import { loadBotHistory, type BotHistoryApi } from '../../export/botHistorySource.js';
import { exportHistory } from '../../export/exportHistory.js';
import { buildExportFilenames, writeJsonExport, writeVectorJsonl } from '../../export/exportWriter.js';
import { loadBotExportConfig } from '../../runtime/appConfig.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import { createRuntimeLogger } from '../../utils/runtimeLogger.js';

const logDir = process.env.LOG_DIR || 'logs';

const NO_BOT_MESSAGES_HINT = 'Сообщения не найдены. Попробуйте отправить новые сообщения в чат.';

function createBotHistoryApi(token: string): BotHistoryApi {
  const api = new Api(token);
  return {
    getFile: (fileId) => api.getFile(fileId),
    getChat: (chatId) => api.getChat(chatId),
    getUpdates: (params) => api.getUpdates(params),
  };
}

const run = async () => {
  const config = loadBotExportConfig(process.env);
  const logger = createRuntimeLogger({ logDir: config.logDir, component: 'export.bot' });

  try {
    const history = await loadBotHistory({
      api: createBotHistoryApi(config.botToken),
      token: config.botToken,
      chatId: config.chatId,
      limit: config.limit,
      logger,
    });

    const messages = await exportHistory({ chat: history.chat, messages: history.messages, logger });
    if (messages.length === 0) {
      console.log(NO_BOT_MESSAGES_HINT);
      return;
    }

    const files = buildExportFilenames('bot', new Date(), config.exportDir);
    await writeJsonExport(files.json, messages);
    await writeVectorJsonl(files.jsonl, messages);
    logger.info('export.written', { count: messages.length, json: files.json, jsonl: files.jsonl });

    console.log(`Экспортировано сообщений: ${messages.length} (${history.chat.title})`);
    console.log(`- ${files.json}`);
    console.log(`- ${files.jsonl}`);
  } finally {
    await logger.flush();
  }
};

run().catch((err) => {
  reportStartupError(err, { mode: 'export-bot', logDir });
  process.exit(1);
});
