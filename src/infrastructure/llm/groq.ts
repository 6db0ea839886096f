import Groq from 'groq-sdk';
import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { LLMProvider, LLMResponse, LLMRequestOptions } from './types.js';

export const DEFAULT_VISION_MODEL = 'meta-llama/llama-4-scout-17b-16e-instruct';
const DEFAULT_MAX_TOKENS = 3000;
const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_TIMEOUT_MS = 60_000;

const log = logger.child({ module: 'llm-groq' });

type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string; detail?: 'auto' | 'low' | 'high' } };

export interface GroqClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: 'user'; content: ContentPart[] }>;
          temperature?: number;
          max_tokens?: number;
        },
        options?: { timeout?: number; maxRetries?: number },
      ): Promise<{
        choices: Array<{ message?: { content?: string | null } }>;
        model: string;
        usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
      }>;
    };
  };
}

export class GroqProvider implements LLMProvider {
  private readonly client: GroqClient;
  readonly model: string;

  constructor(client: GroqClient, model?: string) {
    this.client = client;
    this.model = model ?? DEFAULT_VISION_MODEL;
  }

  async complete(
    instruction: string,
    image: Buffer | null,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>> {
    const startTime = Date.now();
    const ctx = { model: this.model, withImage: image !== null };

    log.debug(ctx, 'Calling Groq vision completion');

    const content: ContentPart[] = [{ type: 'text', text: instruction }];
    if (image) {
      content.push({
        type: 'image_url',
        image_url: { url: `data:image/jpeg;base64,${image.toString('base64')}`, detail: 'high' },
      });
    }

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content }],
          temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
          max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
        },
        { timeout: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS, maxRetries: 0 },
      );

      const latencyMs = Date.now() - startTime;
      const text = response.choices[0]?.message?.content;

      if (!text) {
        log.error({ ...ctx, latencyMs, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'Groq returned empty response');
        return err(
          createAppError(
            ErrorCode.LLM_MALFORMED_RESPONSE,
            'Groq returned empty response content',
            false,
          ),
        );
      }

      const usage = response.usage;
      const result: LLMResponse = {
        content: text,
        model: response.model,
        usage: {
          promptTokens: usage?.prompt_tokens ?? 0,
          completionTokens: usage?.completion_tokens ?? 0,
          totalTokens: usage?.total_tokens ?? 0,
        },
        latencyMs,
      };

      log.info(
        {
          ...ctx,
          latencyMs,
          promptTokens: result.usage.promptTokens,
          completionTokens: result.usage.completionTokens,
        },
        'Groq vision completion succeeded',
      );

      return ok(result);
    } catch (cause) {
      const latencyMs = Date.now() - startTime;
      return this.mapError(cause, latencyMs);
    }
  }

  private mapError(cause: unknown, latencyMs: number): Result<never, AppError> {
    const details = cause instanceof Error ? cause.message : String(cause);
    const status = this.extractStatus(cause);
    const ctx = { model: this.model, latencyMs, status, details };

    if (status === 401) {
      log.error({ ...ctx, errorCode: ErrorCode.LLM_AUTH_ERROR, retryable: false }, 'Groq authentication failed');
      return err(createAppError(ErrorCode.LLM_AUTH_ERROR, 'Groq API authentication failed', false, details));
    }

    if (status === 429) {
      log.warn({ ...ctx, errorCode: ErrorCode.LLM_RATE_LIMITED, retryable: true }, 'Groq rate limited');
      return err(createAppError(ErrorCode.LLM_RATE_LIMITED, 'Groq API rate limited', true, details));
    }

    if (status === undefined && /timed?\s?out/i.test(details)) {
      log.warn({ ...ctx, errorCode: ErrorCode.LLM_TIMEOUT, retryable: true }, 'Groq request timed out');
      return err(createAppError(ErrorCode.LLM_TIMEOUT, 'Groq API request timed out', true, details));
    }

    if (status !== undefined && status >= 500) {
      log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR, retryable: true }, 'Groq server error');
      return err(createAppError(ErrorCode.LLM_API_ERROR, `Groq API returned ${status}`, true, details));
    }

    log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR, retryable: true }, 'Groq API call failed');
    return err(createAppError(ErrorCode.LLM_API_ERROR, 'Groq API call failed', true, details));
  }

  private extractStatus(cause: unknown): number | undefined {
    if (
      cause !== null &&
      typeof cause === 'object' &&
      'status' in cause &&
      typeof cause.status === 'number'
    ) {
      return cause.status;
    }
    return undefined;
  }
}

export function createGroqClient(apiKey: string, timeoutMs?: number): GroqClient {
  return new Groq({ apiKey, maxRetries: 0, timeout: timeoutMs ?? DEFAULT_TIMEOUT_MS });
}
