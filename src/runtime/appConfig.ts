import { z } from 'zod';

import { DEFAULT_TRIGGER_PHRASES } from '../interfaces/telegram/triggers.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);

export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return fallback;
  return TRUTHY_VALUES.has(normalized);
}

export function parseTriggerPhrases(value: string | undefined): string[] {
  const phrases = (value ?? '')
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
  return phrases.length > 0 ? phrases : [...DEFAULT_TRIGGER_PHRASES];
}

/** Answer to the interactive limit prompt; blank keeps the default. */
export function parseExportLimit(value: string, fallback: number): number {
  const trimmed = value.trim();
  if (!trimmed) return fallback;
  if (!/^\d+$/.test(trimmed) || Number.parseInt(trimmed, 10) <= 0) {
    throw new ConfigError('Export limit must be a positive integer');
  }
  return Number.parseInt(trimmed, 10);
}

const requiredString = (name: string) =>
  z
    .string({ required_error: `Missing ${name} in environment` })
    .trim()
    .min(1, `Missing ${name} in environment`);

const optionalString = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : fallback));

const positiveInt = (name: string, fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (!value) return fallback;
      const parsed = Number.parseInt(value, 10);
      if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a positive integer` });
        return z.NEVER;
      }
      return parsed;
    });

const chatIdString = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, `${name} must be a numeric chat id`)
    .transform((value) => Number.parseInt(value, 10));

const LOG_DIR = optionalString('logs');

const BOT_ENV_SCHEMA = z.object({
  BOT_TOKEN: requiredString('BOT_TOKEN'),
  OPENAI_API_KEY: requiredString('OPENAI_API_KEY'),
  SHOW_CHAT_ID: z.string().optional(),
  SYSTEM_INSTRUCTIONS_PATH: optionalString('system_instructions.txt'),
  OPENAI_MODEL: optionalString('gpt-4o'),
  TRIGGER_PHRASES: z.string().optional(),
  LOG_DIR,
});

const BOT_EXPORT_ENV_SCHEMA = z.object({
  BOT_TOKEN: requiredString('BOT_TOKEN'),
  CHAT_ID: requiredString('CHAT_ID').pipe(chatIdString('CHAT_ID')),
  EXPORT_LIMIT: positiveInt('EXPORT_LIMIT', 100),
  EXPORT_DIR: optionalString('.'),
  LOG_DIR,
});

const TELEGRAM_USER_ENV_SCHEMA = z.object({
  TELEGRAM_API_ID: requiredString('TELEGRAM_API_ID').pipe(
    z
      .string()
      .regex(/^\d+$/, 'TELEGRAM_API_ID must be numeric')
      .transform((value) => Number.parseInt(value, 10)),
  ),
  TELEGRAM_API_HASH: requiredString('TELEGRAM_API_HASH'),
  TELEGRAM_PHONE: requiredString('TELEGRAM_PHONE'),
  TELEGRAM_SESSION_FILE: optionalString('telegram.session'),
});

const USER_EXPORT_ENV_SCHEMA = TELEGRAM_USER_ENV_SCHEMA.extend({
  CHAT_ID: z.string().trim().optional(),
  OPENAI_API_KEY: z.string().trim().optional(),
  OPENAI_MODEL: optionalString('gpt-4o'),
  EXPORT_DIR: optionalString('.'),
  LOG_DIR,
});

const GROUP_DETECTOR_ENV_SCHEMA = z.object({
  BOT_TOKEN: requiredString('BOT_TOKEN'),
  GROUPS_FILE: optionalString('detected_groups.json'),
  GROUP_STARTUP_SCAN: z.string().optional(),
  LOG_DIR,
});

export type BotConfig = {
  botToken: string;
  openaiApiKey: string;
  showChatId: boolean;
  systemInstructionsPath: string;
  model: string;
  triggerPhrases: string[];
  logDir: string;
};

export type BotExportConfig = {
  botToken: string;
  chatId: number;
  limit: number;
  exportDir: string;
  logDir: string;
};

export type TelegramUserConfig = {
  apiId: number;
  apiHash: string;
  phone: string;
  sessionFile: string;
};

export type UserExportConfig = TelegramUserConfig & {
  /** Username or numeric id; prompted for when absent. */
  chat: string | null;
  openaiApiKey: string | null;
  model: string;
  exportDir: string;
  logDir: string;
};

export type GroupDetectorConfig = {
  botToken: string;
  groupsFile: string;
  startupScan: boolean;
  logDir: string;
};

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.output<T> {
  const res = schema.safeParse(env);
  if (!res.success) {
    const message = res.error.issues.map((issue) => issue.message).join('; ');
    throw new ConfigError(message);
  }
  return res.data;
}

export function loadBotConfig(env: NodeJS.ProcessEnv): BotConfig {
  const parsed = parseEnv(BOT_ENV_SCHEMA, env);
  return {
    botToken: parsed.BOT_TOKEN,
    openaiApiKey: parsed.OPENAI_API_KEY,
    showChatId: parseBooleanFlag(parsed.SHOW_CHAT_ID, false),
    systemInstructionsPath: parsed.SYSTEM_INSTRUCTIONS_PATH,
    model: parsed.OPENAI_MODEL,
    triggerPhrases: parseTriggerPhrases(parsed.TRIGGER_PHRASES),
    logDir: parsed.LOG_DIR,
  };
}

export function loadBotExportConfig(env: NodeJS.ProcessEnv): BotExportConfig {
  const parsed = parseEnv(BOT_EXPORT_ENV_SCHEMA, env);
  return {
    botToken: parsed.BOT_TOKEN,
    chatId: parsed.CHAT_ID,
    limit: parsed.EXPORT_LIMIT,
    exportDir: parsed.EXPORT_DIR,
    logDir: parsed.LOG_DIR,
  };
}

export function loadTelegramUserConfig(env: NodeJS.ProcessEnv): TelegramUserConfig {
  const parsed = parseEnv(TELEGRAM_USER_ENV_SCHEMA, env);
  return {
    apiId: parsed.TELEGRAM_API_ID,
    apiHash: parsed.TELEGRAM_API_HASH,
    phone: parsed.TELEGRAM_PHONE,
    sessionFile: parsed.TELEGRAM_SESSION_FILE,
  };
}

export function loadUserExportConfig(env: NodeJS.ProcessEnv): UserExportConfig {
  const parsed = parseEnv(USER_EXPORT_ENV_SCHEMA, env);
  return {
    apiId: parsed.TELEGRAM_API_ID,
    apiHash: parsed.TELEGRAM_API_HASH,
    phone: parsed.TELEGRAM_PHONE,
    sessionFile: parsed.TELEGRAM_SESSION_FILE,
    chat: parsed.CHAT_ID || null,
    openaiApiKey: parsed.OPENAI_API_KEY || null,
    model: parsed.OPENAI_MODEL,
    exportDir: parsed.EXPORT_DIR,
    logDir: parsed.LOG_DIR,
  };
}

export function loadGroupDetectorConfig(env: NodeJS.ProcessEnv): GroupDetectorConfig {
  const parsed = parseEnv(GROUP_DETECTOR_ENV_SCHEMA, env);
  return {
    botToken: parsed.BOT_TOKEN,
    groupsFile: parsed.GROUPS_FILE,
    startupScan: parseBooleanFlag(parsed.GROUP_STARTUP_SCAN, true),
    logDir: parsed.LOG_DIR,
  };
}
