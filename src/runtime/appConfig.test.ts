import { describe, expect, it } from 'vitest';

import {
  ConfigError,
  loadBotConfig,
  loadBotExportConfig,
  loadGroupDetectorConfig,
  loadUserExportConfig,
  parseBooleanFlag,
  parseExportLimit,
  parseTriggerPhrases,
} from './appConfig.js';
import { DEFAULT_TRIGGER_PHRASES } from '../interfaces/telegram/triggers.js';

describe('appConfig', () => {
  it('loads bot config with defaults', () => {
    const config = loadBotConfig({ BOT_TOKEN: 'test-token', OPENAI_API_KEY: 'test-key' });

    expect(config).toEqual({
      botToken: 'test-token',
      openaiApiKey: 'test-key',
      showChatId: false,
      systemInstructionsPath: 'system_instructions.txt',
      model: 'gpt-4o',
      triggerPhrases: [...DEFAULT_TRIGGER_PHRASES],
      logDir: 'logs',
    });
  });

  it('reads SHOW_CHAT_ID and custom trigger phrases', () => {
    const config = loadBotConfig({
      BOT_TOKEN: 'test-token',
      OPENAI_API_KEY: 'test-key',
      SHOW_CHAT_ID: 'True',
      TRIGGER_PHRASES: ' Объясни , ,мпб',
    });

    expect(config.showChatId).toBe(true);
    expect(config.triggerPhrases).toEqual(['объясни', 'мпб']);
  });

  it('fails with a config error when a required variable is missing', () => {
    expect(() => loadBotConfig({ OPENAI_API_KEY: 'test-key' })).toThrow(ConfigError);
    expect(() => loadBotConfig({ OPENAI_API_KEY: 'test-key' })).toThrow(
      'Missing BOT_TOKEN in environment',
    );
    expect(() => loadBotConfig({ BOT_TOKEN: '  ', OPENAI_API_KEY: 'test-key' })).toThrow(
      'Missing BOT_TOKEN in environment',
    );
  });

  it('parses the export chat id and limit', () => {
    const config = loadBotExportConfig({
      BOT_TOKEN: 'test-token',
      CHAT_ID: '-100123',
      EXPORT_LIMIT: '25',
    });

    expect(config).toEqual({
      botToken: 'test-token',
      chatId: -100123,
      limit: 25,
      exportDir: '.',
      logDir: 'logs',
    });
  });

  it('rejects a non-numeric chat id and a bad limit', () => {
    expect(() => loadBotExportConfig({ BOT_TOKEN: 'test-token', CHAT_ID: '@chat' })).toThrow(
      'CHAT_ID must be a numeric chat id',
    );
    expect(() =>
      loadBotExportConfig({ BOT_TOKEN: 'test-token', CHAT_ID: '1', EXPORT_LIMIT: '0' }),
    ).toThrow('EXPORT_LIMIT must be a positive integer');
  });

  it('loads the user exporter config with optional chat and OpenAI key', () => {
    const config = loadUserExportConfig({
      TELEGRAM_API_ID: '12345',
      TELEGRAM_API_HASH: 'test-hash',
      TELEGRAM_PHONE: '+10000000000',
    });

    expect(config).toEqual({
      apiId: 12345,
      apiHash: 'test-hash',
      phone: '+10000000000',
      sessionFile: 'telegram.session',
      chat: null,
      openaiApiKey: null,
      model: 'gpt-4o',
      exportDir: '.',
      logDir: 'logs',
    });
  });

  it('enables the startup scan unless disabled', () => {
    expect(loadGroupDetectorConfig({ BOT_TOKEN: 'test-token' }).startupScan).toBe(true);
    expect(
      loadGroupDetectorConfig({ BOT_TOKEN: 'test-token', GROUP_STARTUP_SCAN: 'false' }).startupScan,
    ).toBe(false);
  });

  it('parses boolean flags and phrase lists', () => {
    expect(parseBooleanFlag(undefined, true)).toBe(true);
    expect(parseBooleanFlag('on', false)).toBe(true);
    expect(parseBooleanFlag('0', true)).toBe(false);
    expect(parseTriggerPhrases('')).toEqual([...DEFAULT_TRIGGER_PHRASES]);
  });

  it('parses the interactive export limit', () => {
    expect(parseExportLimit('', 1000)).toBe(1000);
    expect(parseExportLimit(' 250 ', 1000)).toBe(250);
    expect(() => parseExportLimit('0', 1000)).toThrow('Export limit must be a positive integer');
    expect(() => parseExportLimit('много', 1000)).toThrow(ConfigError);
  });
});
