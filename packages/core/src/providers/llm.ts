/**
 * @module providers/llm
 * Primary text transform backed by an OpenAI-compatible chat endpoint
 * (OpenAI or OpenRouter).
 */

import { z } from 'zod';

import type { LLMConfig } from '../config.js';
import type { Logger } from '../context.js';
import { ServiceError, type ServiceErrorKind } from '../errors.js';
import type { TextTransformService, TransformMode } from '../fallback.js';

// ---------------------------------------------------------------------------
// Prompts
// ---------------------------------------------------------------------------

const SYSTEM_PROMPTS: Record<TransformMode, string> = {
  literal: [
    'You transcribe English text into Grade 1 (uncontracted) Unicode Braille.',
    'Output only characters from the Unicode Braille Patterns block (U+2800 to U+28FF).',
    'Use U+2800 for spaces. Keep every word; do not summarise, explain, or add text.',
  ].join(' '),
  optimized: [
    'You rewrite transcripts so they read well in Braille.',
    'Use short sentences and plain words, drop filler words and false starts,',
    'and keep every fact. Output only the rewritten text.',
  ].join(' '),
};

// ---------------------------------------------------------------------------
// Response schema
// ---------------------------------------------------------------------------

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export interface LLMTextTransformOptions {
  name: string;
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  logger: Logger;
  extraHeaders?: Record<string, string>;
  /** Injected for tests. Default: global fetch */
  fetchImpl?: typeof fetch;
}

export class LLMTextTransformService implements TextTransformService {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly opts: LLMTextTransformOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: LLMTextTransformOptions) {
    this.name = opts.name;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.opts = opts;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async transform(text: string, mode: TransformMode, signal?: AbortSignal): Promise<string> {
    const { model, apiKey, temperature, maxTokens, logger, extraHeaders } = this.opts;
    const body = {
      model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPTS[mode] },
        { role: 'user', content: text },
      ],
      temperature,
      max_tokens: maxTokens,
    };

    logger.debug(`LLM ${mode} request to ${this.name} (${model}), ${text.length} chars`);

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${apiKey}`,
          ...extraHeaders,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      throw new ServiceError(this.name, 'network', 'request failed', err);
    }

    if (!res.ok) {
      const errBody = await res.text();
      throw new ServiceError(this.name, httpErrorKind(res.status), `HTTP ${res.status}: ${errBody.slice(0, 200)}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ServiceError(this.name, 'remote', 'unexpected response shape', parsed.error);
    }
    return parsed.data.choices[0]?.message.content ?? '';
  }
}

/** Map an HTTP status to a ServiceError kind. */
export function httpErrorKind(status: number): ServiceErrorKind {
  if (status === 401) return 'auth';
  if (status === 403) return 'permission';
  if (status === 404) return 'not-found';
  if (status === 429) return 'throttled';
  if (status >= 500) return 'remote';
  return 'invalid-input';
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Build the primary transform from config. Returns undefined without an API key. */
export function createTransformService(
  config: LLMConfig,
  logger: Logger,
): TextTransformService | undefined {
  if (!config.apiKey) return undefined;

  const common = {
    apiKey: config.apiKey,
    model: config.model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    logger,
  };

  switch (config.provider) {
    case 'openai':
      return new LLMTextTransformService({
        ...common,
        name: 'openai',
        baseUrl: 'https://api.openai.com/v1',
      });
    case 'openrouter':
      return new LLMTextTransformService({
        ...common,
        name: 'openrouter',
        baseUrl: 'https://openrouter.ai/api/v1',
        extraHeaders: { 'X-Title': 'touch' },
      });
  }
}
