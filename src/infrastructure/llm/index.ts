export type { LLMProvider, LLMResponse, LLMRequestOptions, LLMProviderConfig } from './types.js';
export { GroqProvider, createGroqClient, DEFAULT_VISION_MODEL } from './groq.js';
export type { GroqClient } from './groq.js';

import { GroqProvider, createGroqClient } from './groq.js';
import type { LLMProvider, LLMProviderConfig } from './types.js';

export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  switch (config.provider) {
    case 'groq':
      return new GroqProvider(createGroqClient(config.apiKey, config.timeoutMs), config.model);
    default:
      throw new Error(`Unsupported LLM provider: ${String(config.provider)}`);
  }
}
