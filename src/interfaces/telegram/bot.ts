import type { Explainer, ExplainInput } from '../../explain/explainer.js';
import { appendJsonl, type EventLogRecord } from '../../utils/logging.js';
import { createRuntimeLogger, serializeError, type RuntimeLogger } from '../../utils/runtimeLogger.js';
import { isAddressedToBot, parseTelegramSlashCommand } from './commands.js';
import { resolveContent, selectContent, type ResolvedContent } from './contentResolver.js';
import { createGrammyBot } from './grammyBot.js';
import { downloadTelegramFile } from './telegramFiles.js';
import { containsTriggerPhrase, DEFAULT_TRIGGER_PHRASES } from './triggers.js';
import type { TelegramChat, TelegramFileApi, TelegramMessage, TelegramUser } from './types.js';

export type TelegramContext = {
  chat: TelegramChat;
  message: TelegramMessage;
  from?: TelegramUser;
  reply: (text: string) => Promise<unknown>;
};

export type TelegramBotLike = {
  on: (event: 'message', handler: (ctx: TelegramContext) => Promise<void> | void) => void;
  catch: (handler: (err: unknown) => Promise<void> | void) => void;
  start: () => Promise<void>;
  api: TelegramFileApi;
  /** Known once the bot has fetched its own profile. */
  getUsername?: () => string | undefined;
};

type TelegramAdapterDeps = {
  appendJsonl: typeof appendJsonl;
  downloadTelegramFile: typeof downloadTelegramFile;
};

export type TelegramAdapterOptions = {
  token: string;
  explainer: Pick<Explainer, 'explain'>;
  triggerPhrases?: readonly string[];
  showChatId?: boolean;
  logDir?: string;
  bot?: TelegramBotLike;
  logger?: RuntimeLogger;
  now?: () => Date;
  deps?: Partial<TelegramAdapterDeps>;
};

export type TelegramAdapter = {
  bot: TelegramBotLike;
  start: () => Promise<void>;
};

type ExplainMode = 'command' | 'trigger';

export const GENERIC_ERROR_REPLY = 'Произошла ошибка при обработке запроса.';

export const COMMAND_NOT_FOUND_REPLY =
  'Не найдено изображение или текст для анализа. Прикрепите фото, добавьте текст к команде или ответьте на сообщение.';
export const TRIGGER_NOT_FOUND_REPLY =
  'Не вижу, что пояснять. Прикрепите фото, напишите текст или ответьте на сообщение.';

export const COMMAND_PROGRESS_REPLY = 'Анализирую...';
export const TRIGGER_PROGRESS_REPLY = 'Пояснительная бригада прибыла! Анализирую...';

const TRIGGER_RESULT_PREFIX = '🔍 ';

export function buildStartReply(triggerPhrases: readonly string[]): string {
  const phrases = triggerPhrases.map((phrase) => `• "${phrase}"`).join('\n');
  return [
    '🤖 Пояснительная бригада готова к работе!',
    '',
    'Я помогаю объяснять мемы, шутки и непонятные сообщения.',
    '',
    'Команды:',
    '/explain - объяснить фото или текст (можно ответом на сообщение)',
    '',
    'Триггерные фразы:',
    phrases,
    '',
    'Просто напишите одну из фраз и прикрепите фото, или ответьте на сообщение с фото или текстом.',
  ].join('\n');
}

function toExplainInput(content: Extract<ResolvedContent, { kind: 'image' | 'text' }>): ExplainInput {
  if (content.kind === 'text') {
    return { kind: 'text', text: content.text };
  }
  return { kind: 'image', bytes: content.bytes, mimeType: content.mimeType };
}

export function createTelegramAdapter(options: TelegramAdapterOptions): TelegramAdapter {
  const {
    token,
    explainer,
    triggerPhrases = DEFAULT_TRIGGER_PHRASES,
    showChatId = false,
    logDir = 'logs',
    bot: providedBot,
    now = () => new Date(),
    deps = {},
  } = options;

  const { appendJsonl: appendJsonlImpl, downloadTelegramFile: downloadTelegramFileImpl } = {
    appendJsonl,
    downloadTelegramFile,
    ...deps,
  };

  const logPath = `${logDir}/events.jsonl`;
  const runtimeLogger = options.logger ?? createRuntimeLogger({ logDir, component: 'telegram.bot' });
  const bot = providedBot ?? createGrammyBot(token);

  runtimeLogger.info('adapter initialized', {
    showChatId,
    triggerPhrases: triggerPhrases.length,
  });

  // An unwritable event log must not cost the user a reply.
  const writeLog = async (record: EventLogRecord) => {
    try {
      await appendJsonlImpl(logPath, record);
    } catch (err) {
      runtimeLogger.error('event log append failed', { type: record.type, error: serializeError(err) });
    }

    if (record.type === 'explain.run.error') {
      runtimeLogger.error('explain.run.error', record.data);
      return;
    }

    if (record.type === 'explain.not_found' && record.data.reason === 'download_failed') {
      runtimeLogger.warn('explain.download_failed', record.data);
      return;
    }

    if (record.type === 'explain.run.success') {
      runtimeLogger.info('explain.run.success', {
        chatId: record.data.chatId,
        kind: record.data.kind,
        mode: record.data.mode,
      });
    }
  };

  const withChatId = (text: string, chatId: number, separator: string) =>
    showChatId ? `${text}${separator}(chat_id: ${chatId})` : text;

  const download = async (fileId: string) => {
    const file = await downloadTelegramFileImpl({ api: bot.api, token, fileId });
    return file.bytes;
  };

  const handleExplain = async (ctx: TelegramContext, input: { mode: ExplainMode; text: string }) => {
    const chatId = ctx.chat.id;
    const userId = String(ctx.from?.id ?? 'unknown');

    try {
      const selection = selectContent({ message: ctx.message, text: input.text, triggerPhrases });
      const content = await resolveContent(selection, download);

      if (content.kind === 'none') {
        await writeLog({
          ts: now().toISOString(),
          type: 'explain.not_found',
          data: {
            chatId,
            userId,
            mode: input.mode,
            reason: content.reason,
            ...(content.reason === 'download_failed' ? { error: serializeError(content.error) } : {}),
          },
        });

        const notFound = input.mode === 'command' ? COMMAND_NOT_FOUND_REPLY : TRIGGER_NOT_FOUND_REPLY;
        await ctx.reply(withChatId(notFound, chatId, ' '));
        return;
      }

      await writeLog({
        ts: now().toISOString(),
        type: 'explain.run.start',
        data: {
          chatId,
          userId,
          mode: input.mode,
          kind: content.kind,
          origin: content.origin,
          ...(content.kind === 'image' ? { attachment: content.attachment } : {}),
        },
      });

      const progress = input.mode === 'command' ? COMMAND_PROGRESS_REPLY : TRIGGER_PROGRESS_REPLY;
      await ctx.reply(withChatId(progress, chatId, ' '));

      const explanation = await explainer.explain(toExplainInput(content));
      const body = input.mode === 'trigger' ? `${TRIGGER_RESULT_PREFIX}${explanation}` : explanation;

      await writeLog({
        ts: now().toISOString(),
        type: 'explain.run.success',
        data: { chatId, userId, mode: input.mode, kind: content.kind, finalOutput: explanation },
      });

      await ctx.reply(withChatId(body, chatId, '\n\n'));
    } catch (err) {
      await writeLog({
        ts: now().toISOString(),
        type: 'explain.run.error',
        data: { chatId, userId, mode: input.mode, error: serializeError(err) },
      });

      await ctx.reply(GENERIC_ERROR_REPLY);
    }
  };

  bot.on('message', async (ctx) => {
    const text = (ctx.message.text ?? ctx.message.caption ?? '').trim();
    if (!text) return;

    const command = parseTelegramSlashCommand(text);
    const ownCommand = command && isAddressedToBot(command, bot.getUsername?.()) ? command : null;
    if (command && ownCommand?.commandName !== 'start' && ownCommand?.commandName !== 'explain') return;
    const mode: ExplainMode | 'start' | null =
      ownCommand?.commandName === 'start'
        ? 'start'
        : ownCommand?.commandName === 'explain'
          ? 'command'
          : containsTriggerPhrase(text, triggerPhrases)
            ? 'trigger'
            : null;
    if (!mode) return;

    await writeLog({
      ts: now().toISOString(),
      type: 'telegram.update',
      data: {
        chatId: ctx.chat.id,
        chatType: ctx.chat.type,
        userId: String(ctx.from?.id ?? 'unknown'),
        messageId: ctx.message.message_id,
        mode,
        text,
      },
    });

    if (mode === 'start') {
      await ctx.reply(buildStartReply(triggerPhrases));
      return;
    }

    await handleExplain(ctx, { mode, text: ownCommand && mode === 'command' ? ownCommand.args : text });
  });

  bot.catch(async (err) => {
    await writeLog({
      ts: now().toISOString(),
      type: 'explain.run.error',
      data: { channel: 'telegram', error: serializeError(err) },
    });
  });

  return {
    bot,
    start: () => bot.start(),
  };
}
