/**
 * OpenAI chat-completions content generator.
 *
 * Injects the topic into the prompt template, calls the chat-completions
 * endpoint and cleans the completion. HTTP failures are mapped onto the
 * pipeline error taxonomy so the retry engine can classify them.
 */

import { z } from 'zod';
import type { ContentGenerator } from '../types/adapters.js';
import {
  AuthenticationFailedError,
  NetworkError,
  RateLimitedError,
  UpstreamError,
} from '../types/pipeline-error.js';
import type { OpenAIConfig } from '../config/index.js';
import { injectTopic } from './prompt-template.js';
import { cleanPost } from './post-cleaner.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('openai-generator');

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a social media copywriter.',
  'Write one original post about the subject given in the prompt.',
  'The examples in the prompt are style references only; do not copy them.',
  'Follow the formatting instructions in the prompt strictly and return only the post text.',
].join(' ');

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

export interface OpenAIGeneratorOptions extends OpenAIConfig {
  apiKey: string;
  systemPrompt?: string;
  fetch?: typeof fetch;
}

export class OpenAIGenerator implements ContentGenerator {
  private readonly options: OpenAIGeneratorOptions;
  private readonly fetchFn: typeof fetch;
  private readonly endpoint: string;

  constructor(options: OpenAIGeneratorOptions) {
    this.options = options;
    this.fetchFn = options.fetch ?? fetch;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
  }

  async generate(topic: string, template: string, signal?: AbortSignal): Promise<string> {
    const prompt = injectTopic(template, topic);

    log.info({ model: this.options.model, topic: topic.slice(0, 50) }, 'Requesting completion');

    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`,
        },
        body: JSON.stringify({
          model: this.options.model,
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
          messages: [
            { role: 'system', content: this.options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
        }),
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      throw new NetworkError(
        `OpenAI request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw await this.toHttpError(response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError('OpenAI returned a response that is not JSON', { cause: error });
    }

    const parsed = chatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(`OpenAI returned an unexpected response: ${parsed.error.message}`);
    }

    const raw = parsed.data.choices[0]?.message?.content ?? '';
    const post = cleanPost(raw);
    if (post === '') {
      throw new UpstreamError('OpenAI returned an empty completion');
    }

    log.info({ model: this.options.model, length: post.length }, 'Completion received');
    return post;
  }

  private async toHttpError(response: Response): Promise<Error> {
    const detail = await readErrorDetail(response);
    const message = `OpenAI request failed (${response.status})${detail ? `: ${detail}` : ''}`;

    if (response.status === 429) {
      return new RateLimitedError(message);
    }
    if (response.status === 401 || response.status === 403) {
      return new AuthenticationFailedError(message);
    }
    if (response.status >= 500) {
      return new UpstreamError(message);
    }
    return new UpstreamError(message, { permanent: true });
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  try {
    return (await response.text()).trim().slice(0, 300);
  } catch (error) {
    log.debug({ err: error }, 'Could not read error body');
    return '';
  }
}

/**
 * Build a generator from configuration. Fails when no API key is configured.
 */
export function createOpenAIGenerator(
  config: OpenAIConfig,
  overrides: Pick<OpenAIGeneratorOptions, 'systemPrompt' | 'fetch'> = {}
): OpenAIGenerator {
  if (config.apiKey === undefined) {
    throw new Error('OPENAI_API_KEY is not configured');
  }
  return new OpenAIGenerator({ ...config, apiKey: config.apiKey, ...overrides });
}
