import path from 'node:path';

type StartupMode = 'bot' | 'group-detector' | 'export-bot' | 'export-user' | 'auth-session' | 'convert-html';

type StartupErrorContext = {
  mode: StartupMode;
  logDir?: string;
};

const normalizeMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};

const uniqueSteps = (steps: string[]): string[] => {
  return Array.from(new Set(steps));
};

export function buildNextSteps(message: string): string[] {
  const steps: string[] = [];
  const lower = message.toLowerCase();

  if (lower.includes('bot_token')) {
    steps.push('Set BOT_TOKEN in your environment or .env file.');
  }
  if (lower.includes('openai_api_key')) {
    steps.push('Set OPENAI_API_KEY in your environment or .env file.');
  }
  if (lower.includes('telegram_api_id') || lower.includes('telegram_api_hash') || lower.includes('telegram_phone')) {
    steps.push('Set TELEGRAM_API_ID, TELEGRAM_API_HASH and TELEGRAM_PHONE (from my.telegram.org) in .env.');
  }
  if (lower.includes('chat_id')) {
    steps.push('Set CHAT_ID to the numeric id of the chat (run the group detector to find it).');
  }
  if (lower.includes('session')) {
    steps.push('Run `npm run auth:session` once to sign in and store the Telegram session.');
  }

  steps.push('Copy .env.example to .env and fill in the values you need.');
  return uniqueSteps(steps);
}

export function reportStartupError(err: unknown, context: StartupErrorContext): void {
  const message = normalizeMessage(err);

  console.error(`explain-brigade (${context.mode}) failed to start.`);
  console.error(`Reason: ${message}`);
  if (context.logDir) {
    console.error('Relevant paths:');
    console.error(`- Logs (runtime): ${path.join(context.logDir, 'runtime.jsonl')}`);
    console.error(`- Logs (events): ${path.join(context.logDir, 'events.jsonl')}`);
  }
  console.error('Next steps:');
  for (const step of buildNextSteps(message)) {
    console.error(`- ${step}`);
  }
}
