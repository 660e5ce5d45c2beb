import 'dotenv/config';

import process from 'node:process';
import { Bot } from 'grammy';

import { createGroupDetector, formatGroupSummary, GROUP_DETECTOR_UPDATES } from '../../groups/groupDetector.js';
import { GroupStore } from '../../groups/groupStore.js';
import { loadGroupDetectorConfig } from '../../runtime/appConfig.js';
import { reportStartupError } from '../../runtime/startupErrors.js';
import { createRuntimeLogger, serializeError } from '../../utils/runtimeLogger.js';

const logDir = process.env.LOG_DIR || 'logs';

const start = async () => {
  const config = loadGroupDetectorConfig(process.env);
  const logger = createRuntimeLogger({ logDir: config.logDir, component: 'groups.detector' });

  const store = new GroupStore({ filePath: config.groupsFile });
  await store.load();
  const detector = createGroupDetector({ store, logger });

  const bot = new Bot(config.botToken);
  bot.use(async (ctx) => {
    await detector.handleUpdate(ctx.update);
  });
  bot.catch((err) => {
    logger.error('group.handler_failed', { error: serializeError(err.error) });
  });

  if (config.startupScan) {
    try {
      const found = await detector.scanUpdates(await bot.api.getUpdates({ limit: 100, timeout: 1 }));
      console.log(`Найдено групп при сканировании: ${found}`);
    } catch (err) {
      logger.warn('group.startup_scan_failed', { error: serializeError(err) });
    }
  }

  console.log(formatGroupSummary(store.snapshot()));

  const stop = () => {
    bot.stop().catch((err: unknown) => {
      logger.error('group.stop_failed', { error: serializeError(err) });
    });
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  console.log(`group detector listening, writing ${config.groupsFile}`);
  await bot.start({ drop_pending_updates: true, allowed_updates: GROUP_DETECTOR_UPDATES });

  console.log('📋 Финальный список групп:');
  console.log(formatGroupSummary(store.snapshot()));
  await logger.flush();
};

start().catch((err) => {
  reportStartupError(err, { mode: 'group-detector', logDir });
  process.exit(1);
});
