import { describe, expect, it } from 'vitest';

import { isAddressedToBot, parseTelegramSlashCommand } from './commands.js';

describe('parseTelegramSlashCommand', () => {
  it('parses the command, the addressed bot and the arguments', () => {
    expect(parseTelegramSlashCommand('/Explain@brigade_bot  что это? ')).toEqual({
      commandName: 'explain',
      addressedBotUsername: 'brigade_bot',
      args: 'что это?',
    });
  });

  it('returns empty args for a bare command', () => {
    expect(parseTelegramSlashCommand('/start')).toEqual({
      commandName: 'start',
      addressedBotUsername: undefined,
      args: '',
    });
  });

  it('ignores plain text', () => {
    expect(parseTelegramSlashCommand('мпб /explain')).toBeNull();
  });
});

describe('isAddressedToBot', () => {
  it('accepts commands for this bot or without a username', () => {
    const command = { commandName: 'explain', args: '' };
    expect(isAddressedToBot(command, 'brigade_bot')).toBe(true);
    expect(isAddressedToBot({ ...command, addressedBotUsername: 'Brigade_Bot' }, 'brigade_bot')).toBe(true);
    expect(isAddressedToBot({ ...command, addressedBotUsername: 'other_bot' }, 'brigade_bot')).toBe(false);
    expect(isAddressedToBot({ ...command, addressedBotUsername: 'other_bot' }, undefined)).toBe(true);
  });
});
