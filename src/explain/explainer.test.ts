import { describe, expect, it, vi } from 'vitest';

import {
  createExplainer,
  DESCRIBE_IMAGE_PROMPT,
  IMAGE_EXPLAIN_FAILURE_REPLY,
  IMAGE_EXPLAIN_PROMPT,
  TEXT_EXPLAIN_FAILURE_REPLY,
  TEXT_EXPLAIN_PROMPT,
  type ChatCompletionRequest,
  type ChatCompletionResult,
  type OpenAIChatClientLike,
} from './explainer.js';

const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);

const makeClient = (impl: (body: ChatCompletionRequest) => Promise<ChatCompletionResult>) => {
  const create = vi.fn(impl);
  const client: OpenAIChatClientLike = { chat: { completions: { create } } };
  return Object.assign(client, { create });
};

const reply = (content: string | null): ChatCompletionResult => ({
  choices: [{ message: { content } }],
});

describe('createExplainer', () => {
  it('sends the text prompt with the system message and sampling settings', async () => {
    const client = makeClient(async () => reply('Это игра слов.'));
    const explainer = createExplainer({ client, systemInstructions: 'system text', model: 'gpt-test' });

    await expect(explainer.explain({ kind: 'text', text: 'шутка' })).resolves.toBe('Это игра слов.');
    expect(client.create).toHaveBeenCalledWith({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: `${TEXT_EXPLAIN_PROMPT}\n\nшутка` },
      ],
      max_tokens: 1000,
      temperature: 0.7,
      top_p: 0.9,
      frequency_penalty: 0.3,
      presence_penalty: 0.1,
    });
  });

  it('encodes images as a data URL with the sniffed MIME type', async () => {
    const client = makeClient(async () => reply('Кот на клавиатуре.'));
    const explainer = createExplainer({ client, systemInstructions: 'system text' });

    await explainer.explain({ kind: 'image', bytes: PNG_BYTES });

    const body = client.create.mock.calls[0][0];
    expect(body.model).toBe('gpt-4o');
    expect(body.messages[1]).toEqual({
      role: 'user',
      content: [
        { type: 'text', text: IMAGE_EXPLAIN_PROMPT },
        {
          type: 'image_url',
          image_url: { url: `data:image/png;base64,${Buffer.from(PNG_BYTES).toString('base64')}` },
        },
      ],
    });
  });

  it('returns the image apology when the call throws', async () => {
    const client = makeClient(async () => {
      throw new Error('rate limited');
    });
    const explainer = createExplainer({ client, systemInstructions: 'system text' });

    await expect(explainer.explain({ kind: 'image', bytes: PNG_BYTES, mimeType: 'image/png' })).resolves.toBe(
      IMAGE_EXPLAIN_FAILURE_REPLY,
    );
  });

  it('returns the text apology when the reply has no content', async () => {
    const client = makeClient(async () => reply(null));
    const explainer = createExplainer({ client, systemInstructions: 'system text' });

    await expect(explainer.explain({ kind: 'text', text: 'что?' })).resolves.toBe(TEXT_EXPLAIN_FAILURE_REPLY);
  });
});

describe('describeImage', () => {
  it('returns the description without a system message', async () => {
    const client = makeClient(async () => reply(' Скриншот переписки. '));
    const explainer = createExplainer({ client, systemInstructions: 'system text' });

    await expect(explainer.describeImage(PNG_BYTES)).resolves.toBe('Скриншот переписки.');

    const body = client.create.mock.calls[0][0];
    expect(body.max_tokens).toBe(500);
    expect(body.messages).toHaveLength(1);
    expect(body.messages[0]).toMatchObject({
      role: 'user',
      content: [{ type: 'text', text: DESCRIBE_IMAGE_PROMPT }, { type: 'image_url' }],
    });
  });

  it('returns null on failure', async () => {
    const client = makeClient(async () => {
      throw new Error('boom');
    });
    const explainer = createExplainer({ client, systemInstructions: 'system text' });

    await expect(explainer.describeImage(PNG_BYTES)).resolves.toBeNull();
  });
});
