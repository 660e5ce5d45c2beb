export type TelegramSlashCommand = {
  commandName: string;
  addressedBotUsername?: string;
  args: string;
};

export function parseTelegramSlashCommand(text: string): TelegramSlashCommand | null {
  const match = text.trim().match(/^\/([a-zA-Z0-9_]+)(?:@([a-zA-Z0-9_]+))?(?:\s+([\s\S]+))?$/i);
  if (!match) return null;

  return {
    commandName: match[1].toLowerCase(),
    addressedBotUsername: match[2],
    args: match[3]?.trim() ?? '',
  };
}

/**
 * A command addressed to another bot (`/explain@other_bot`) is not ours. Without a known username
 * every command is accepted.
 */
export function isAddressedToBot(command: TelegramSlashCommand, botUsername: string | undefined): boolean {
  if (!command.addressedBotUsername || !botUsername) return true;
  return command.addressedBotUsername.toLowerCase() === botUsername.toLowerCase();
}
