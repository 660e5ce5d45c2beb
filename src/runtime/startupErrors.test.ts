import { describe, expect, it } from 'vitest';

import { buildNextSteps } from './startupErrors.js';

describe('startupErrors', () => {
  it('suggests setting the missing variables', () => {
    expect(buildNextSteps('Missing BOT_TOKEN in environment; Missing OPENAI_API_KEY in environment')).toEqual([
      'Set BOT_TOKEN in your environment or .env file.',
      'Set OPENAI_API_KEY in your environment or .env file.',
      'Copy .env.example to .env and fill in the values you need.',
    ]);
  });

  it('points at the session bootstrap when the session is missing', () => {
    expect(buildNextSteps('Telegram session is not authorized')).toContain(
      'Run `npm run auth:session` once to sign in and store the Telegram session.',
    );
  });
});
