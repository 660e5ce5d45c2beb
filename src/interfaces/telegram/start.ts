import 'dotenv/config';

import process from 'node:process';
import { createTelegramAdapter } from './bot.js';
import { createExplainer, createOpenAIChatClient } from '../../explain/explainer.js';
import { loadSystemInstructions } from '../../explain/systemInstructions.js';
import { loadBotConfig } from '../../runtime/appConfig.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import { createRuntimeLogger } from '../../utils/runtimeLogger.js';

const logDir = process.env.LOG_DIR || 'logs';

const start = async () => {
  const config = loadBotConfig(process.env);
  const logger = createRuntimeLogger({ logDir: config.logDir, component: 'telegram.bot' });

  const instructions = await loadSystemInstructions(config.systemInstructionsPath);
  logger.info('system instructions loaded', {
    source: instructions.source,
    path: config.systemInstructionsPath,
  });

  const explainer = createExplainer({
    client: createOpenAIChatClient(config.openaiApiKey),
    systemInstructions: instructions.text,
    model: config.model,
    logger: logger.child('explainer'),
  });

  const adapter = createTelegramAdapter({
    token: config.botToken,
    explainer,
    triggerPhrases: config.triggerPhrases,
    showChatId: config.showChatId,
    logDir: config.logDir,
    logger,
  });

  console.log('explain-brigade (telegram) starting…');
  await adapter.start();
};

start().catch((err) => {
  reportStartupError(err, { mode: 'bot', logDir });
  process.exit(1);
});
