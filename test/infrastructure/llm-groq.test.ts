import { describe, it, expect, vi } from 'vitest';
import { GroqProvider, DEFAULT_VISION_MODEL, type GroqClient } from '../../src/infrastructure/llm/index.js';

function createMockClient(overrides?: Partial<GroqClient>): GroqClient {
  return {
    chat: {
      completions: {
        create: vi.fn(),
      },
    },
    ...overrides,
  };
}

const successResponse = {
  choices: [{ message: { content: '{"document_type":"paystub","gross_pay_current":4500}' } }],
  model: 'test-vision-model',
  usage: { prompt_tokens: 100, completion_tokens: 50, total_tokens: 150 },
};

describe('GroqProvider.complete', () => {
  it('returns the model answer on success', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue(successResponse);
    const provider = new GroqProvider(client, 'test-vision-model');

    const result = await provider.complete('instruction', null);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.content).toContain('gross_pay_current');
      expect(result.value.model).toBe('test-vision-model');
      expect(result.value.usage.totalTokens).toBe(150);
      expect(result.value.latencyMs).toBeGreaterThanOrEqual(0);
    }
  });

  it('uses the default vision model when none is given', () => {
    const provider = new GroqProvider(createMockClient());
    expect(provider.model).toBe(DEFAULT_VISION_MODEL);
  });

  it('attaches the page image as a base64 JPEG data URL', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue(successResponse);
    const provider = new GroqProvider(client);

    await provider.complete('instruction', Buffer.from('jpeg-bytes'));

    expect(client.chat.completions.create).toHaveBeenCalledWith(
      expect.objectContaining({
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: 'instruction' },
              {
                type: 'image_url',
                image_url: { url: `data:image/jpeg;base64,${Buffer.from('jpeg-bytes').toString('base64')}`, detail: 'high' },
              },
            ],
          },
        ],
      }),
      expect.anything(),
    );
  });

  it('passes temperature, token limit and timeout without retries', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue(successResponse);
    const provider = new GroqProvider(client);

    await provider.complete('instruction', null, { temperature: 0.2, maxTokens: 1000, timeoutMs: 5000 });

    expect(client.chat.completions.create).toHaveBeenCalledWith(
      expect.objectContaining({ temperature: 0.2, max_tokens: 1000 }),
      { timeout: 5000, maxRetries: 0 },
    );
  });

  it('returns LLM_MALFORMED_RESPONSE on empty content', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockResolvedValue({
      choices: [{ message: { content: null } }],
      model: 'test-vision-model',
      usage: undefined,
    });
    const provider = new GroqProvider(client);

    const result = await provider.complete('instruction', null);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_MALFORMED_RESPONSE');
    }
  });

  it('maps 429 to LLM_RATE_LIMITED (retryable)', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockRejectedValue(
      Object.assign(new Error('Rate limited'), { status: 429 }),
    );
    const provider = new GroqProvider(client);

    const result = await provider.complete('instruction', null);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_RATE_LIMITED');
      expect(result.error.retryable).toBe(true);
    }
  });

  it('maps 500 to LLM_API_ERROR (retryable)', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockRejectedValue(
      Object.assign(new Error('Server error'), { status: 500 }),
    );
    const provider = new GroqProvider(client);

    const result = await provider.complete('instruction', null);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_API_ERROR');
      expect(result.error.retryable).toBe(true);
    }
  });

  it('maps 401 to LLM_AUTH_ERROR (not retryable)', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockRejectedValue(
      Object.assign(new Error('Unauthorized'), { status: 401 }),
    );
    const provider = new GroqProvider(client);

    const result = await provider.complete('instruction', null);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_AUTH_ERROR');
      expect(result.error.retryable).toBe(false);
    }
  });

  it('maps a timeout to LLM_TIMEOUT', async () => {
    const client = createMockClient();
    vi.mocked(client.chat.completions.create).mockRejectedValue(new Error('Request timed out.'));
    const provider = new GroqProvider(client);

    const result = await provider.complete('instruction', null);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LLM_TIMEOUT');
    }
  });
});
