import OpenAI from 'openai';

import { buildImageDataUrl, resolveImageMimeType } from '../media/imageMime.js';
import { serializeError, type RuntimeLogger } from '../utils/runtimeLogger.js';

type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: 'auto' | 'low' | 'high' } };

type ChatMessageParam =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | ChatContentPart[] };

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessageParam[];
  max_tokens: number;
  temperature?: number;
  top_p?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
};

export type ChatCompletionResult = {
  choices: Array<{ message: { content: string | null } }>;
};

export type OpenAIChatClientLike = {
  chat: {
    completions: {
      create: (body: ChatCompletionRequest) => Promise<ChatCompletionResult>;
    };
  };
};

export type ExplainInput =
  | { kind: 'image'; bytes: Uint8Array; mimeType?: string }
  | { kind: 'text'; text: string };

export type Explainer = {
  explain: (input: ExplainInput) => Promise<string>;
  /** Detailed description for exports; null when the call fails. */
  describeImage: (bytes: Uint8Array) => Promise<string | null>;
};

export type ExplainerOptions = {
  client: OpenAIChatClientLike;
  systemInstructions: string;
  model?: string;
  logger?: RuntimeLogger;
};

export const DEFAULT_EXPLAIN_MODEL = 'gpt-4o';

export const EXPLAIN_MODEL_SETTINGS = {
  max_tokens: 1000,
  temperature: 0.7,
  top_p: 0.9,
  frequency_penalty: 0.3,
  presence_penalty: 0.1,
} as const;

const DESCRIBE_MAX_TOKENS = 500;

export const IMAGE_EXPLAIN_PROMPT =
  'Объясни этот мем или шутку на изображении. Расскажи, в чем юмор, какие культурные отсылки или контекст нужно знать, чтобы понять смысл. Отвечай на русском языке кратко и понятно.';

export const TEXT_EXPLAIN_PROMPT =
  'Объясни этот текст или шутку. Расскажи, в чем смысл и юмор, какие отсылки или контекст нужно знать. Отвечай на русском языке кратко и понятно.';

export const DESCRIBE_IMAGE_PROMPT =
  'Опиши это изображение подробно на русском языке. Если это мем или шутка, объясни контекст и юмор.';

export const IMAGE_EXPLAIN_FAILURE_REPLY = 'Извините, не смог проанализировать изображение. Попробуйте позже.';
export const TEXT_EXPLAIN_FAILURE_REPLY = 'Извините, не смог проанализировать текст. Попробуйте позже.';

export function createOpenAIChatClient(apiKey: string): OpenAIChatClientLike {
  const client = new OpenAI({ apiKey });
  return {
    chat: {
      completions: {
        create: (body) => client.chat.completions.create(body),
      },
    },
  };
}

function buildUserContent(input: ExplainInput): ChatMessageParam {
  if (input.kind === 'text') {
    return { role: 'user', content: `${TEXT_EXPLAIN_PROMPT}\n\n${input.text}` };
  }

  const mimeType = resolveImageMimeType(input.bytes, input.mimeType);
  return {
    role: 'user',
    content: [
      { type: 'text', text: IMAGE_EXPLAIN_PROMPT },
      { type: 'image_url', image_url: { url: buildImageDataUrl(input.bytes, mimeType) } },
    ],
  };
}

function readContent(result: ChatCompletionResult): string | null {
  const content = result.choices[0]?.message.content?.trim();
  return content ? content : null;
}

export function createExplainer(options: ExplainerOptions): Explainer {
  const { client, systemInstructions, model = DEFAULT_EXPLAIN_MODEL, logger } = options;

  const explain = async (input: ExplainInput): Promise<string> => {
    const fallback = input.kind === 'image' ? IMAGE_EXPLAIN_FAILURE_REPLY : TEXT_EXPLAIN_FAILURE_REPLY;

    try {
      const result = await client.chat.completions.create({
        model,
        messages: [{ role: 'system', content: systemInstructions }, buildUserContent(input)],
        ...EXPLAIN_MODEL_SETTINGS,
      });

      const content = readContent(result);
      if (!content) {
        logger?.warn('explain.empty_response', { kind: input.kind, model });
        return fallback;
      }
      return content;
    } catch (err) {
      logger?.error('explain.failed', { kind: input.kind, model, error: serializeError(err) });
      return fallback;
    }
  };

  const describeImage = async (bytes: Uint8Array): Promise<string | null> => {
    try {
      const result = await client.chat.completions.create({
        model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: DESCRIBE_IMAGE_PROMPT },
              {
                type: 'image_url',
                image_url: { url: buildImageDataUrl(bytes, resolveImageMimeType(bytes)) },
              },
            ],
          },
        ],
        max_tokens: DESCRIBE_MAX_TOKENS,
      });
      return readContent(result);
    } catch (err) {
      logger?.warn('describe.failed', { model, error: serializeError(err) });
      return null;
    }
  };

  return { explain, describeImage };
}
