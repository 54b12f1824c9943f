import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_SYSTEM_PROMPT,
  ProviderConfig,
  ProviderError,
  RateLimitError,
  TimeoutError,
} from '@constify/shared';
import type { RewriteAdapter } from '../adapter';
import type { AdapterContext, RewriteOutcome, RewriteRequest } from '../types';
import { classifyRewriteError, unwrapCodeFence } from '../common';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

export interface OpenAIRewriteAdapterOptions {
  /** Environment to resolve `api_key_env` from; defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
}

/**
 * Rewrites source through any OpenAI-compatible chat completions endpoint.
 * The SDK's own retries are disabled; one call is one attempt.
 */
export class OpenAIRewriteAdapter implements RewriteAdapter {
  private client: OpenAI;
  private readonly systemPrompt: string;

  constructor(
    private readonly config: ProviderConfig,
    options: OpenAIRewriteAdapterOptions = {},
  ) {
    const env = options.env ?? process.env;
    const apiKey = config.api_key || env[config.api_key_env];
    if (config.baseUrl.endsWith('/chat/completions')) {
      throw new ConfigError(
        `provider.baseUrl should stop at the API root (e.g. http://localhost:8000/v1), got ${config.baseUrl}`,
      );
    }
    this.systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.client = new OpenAI({
      // Local servers usually take no credential; the SDK still wants a value.
      apiKey: apiKey || 'no-key',
      baseURL: config.baseUrl,
      maxRetries: 0,
      defaultHeaders: apiKey ? undefined : { Authorization: null },
    });
  }

  id(): string {
    return 'openai';
  }

  async rewrite(req: RewriteRequest, ctx: AdapterContext): Promise<RewriteOutcome> {
    let completion: unknown;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: req.model,
          messages: [
            { role: 'system', content: this.systemPrompt },
            { role: 'user', content: req.source },
          ],
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        {
          signal: ctx.abortSignal,
          timeout: req.timeoutMs,
          maxRetries: 0,
        },
      );
    } catch (error) {
      return classifyRewriteError(this.mapError(error));
    }

    return this.parseCompletion(completion);
  }

  private parseCompletion(completion: unknown): RewriteOutcome {
    const parsed = ChatCompletionSchema.safeParse(completion);
    if (!parsed.success) {
      return {
        kind: 'fatal',
        cause: new ProviderError('Malformed response from rewrite service', {
          details: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
          retryable: false,
        }),
      };
    }

    const content = parsed.data.choices[0].message.content ?? '';
    const text = unwrapCodeFence(content);
    if (text.trim().length === 0) {
      return {
        kind: 'fatal',
        cause: new ProviderError('Rewrite service returned empty content', { retryable: false }),
      };
    }
    return { kind: 'success', text };
  }

  private mapError(error: unknown): unknown {
    // Subclass checks first: every SDK error below extends APIError.
    if (error instanceof APIConnectionTimeoutError) {
      return new TimeoutError(error.message, { cause: error });
    }
    if (error instanceof APIUserAbortError) {
      return new ProviderError('Rewrite request was aborted', { cause: error, retryable: false });
    }
    if (error instanceof APIConnectionError) {
      return new ProviderError(`Connection to rewrite service failed: ${error.message}`, {
        cause: error,
        retryable: true,
      });
    }
    if (error instanceof APIError) {
      const status = error.status;
      if (status === 429) {
        return new RateLimitError(error.message, {
          cause: error,
          retryAfter: parseRetryAfter(error.headers?.['retry-after']),
        });
      }
      return new ProviderError(error.message, {
        cause: error,
        status,
        retryable: status !== undefined && status >= 500,
      });
    }
    return error;
  }
}

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}
