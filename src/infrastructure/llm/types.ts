import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export interface LLMResponse {
  content: string;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  latencyMs: number;
}

export interface LLMRequestOptions {
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/** Vision-capable completion service: one instruction, an optional page image, one text answer. */
export interface LLMProvider {
  readonly model: string;
  complete(
    instruction: string,
    image: Buffer | null,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>>;
}

export interface LLMProviderConfig {
  provider: 'groq';
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}
