import { describe, it, expect } from 'vitest';
import { DEFAULT_PIPELINE_CONFIG, loadConfig, parseConfig } from '../../src/infrastructure/config.js';
import { DEFAULT_VISION_MODEL } from '../../src/infrastructure/llm/index.js';

describe('parseConfig', () => {
  it('applies defaults to an empty environment', () => {
    const result = parseConfig({});
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.vision.apiKey).toBeUndefined();
    expect(result.value.vision.model).toBe(DEFAULT_VISION_MODEL);
    expect(DEFAULT_PIPELINE_CONFIG.vision.model).toBe(DEFAULT_VISION_MODEL);
    expect(result.value.vision.temperature).toBe(0.1);
    expect(result.value.vision.maxTokens).toBe(3000);
    expect(result.value.renderDpi).toBe(200);
    expect(result.value.maxPdfSizeBytes).toBe(25 * 1024 * 1024);
    expect(result.value.validation).toEqual({
      earningsToleranceFloor: 100,
      earningsToleranceRatio: 0.05,
      grossPlausibleMin: 100,
      grossPlausibleMax: 50_000,
    });
    expect(result.value.langfuse).toBeUndefined();
  });

  it('coerces numeric variables', () => {
    const result = parseConfig({ GROQ_API_KEY: 'test-key', VISION_TIMEOUT_MS: '5000', RENDER_DPI: '150' });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.vision.apiKey).toBe('test-key');
    expect(result.value.vision.timeoutMs).toBe(5000);
    expect(result.value.renderDpi).toBe(150);
  });

  it('treats a blank API key as absent', () => {
    const result = parseConfig({ GROQ_API_KEY: '   ' });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.vision.apiKey).toBeUndefined();
  });

  it('enables tracing only when both Langfuse keys are set', () => {
    const partial = parseConfig({ LANGFUSE_PUBLIC_KEY: 'pk-test' });
    expect(partial.ok && partial.value.langfuse).toBeUndefined();

    const full = parseConfig({ LANGFUSE_PUBLIC_KEY: 'pk-test', LANGFUSE_SECRET_KEY: 'test-secret' });
    expect(full.ok).toBe(true);
    if (!full.ok) return;
    expect(full.value.langfuse).toEqual({
      publicKey: 'pk-test',
      secretKey: 'test-secret',
      baseUrl: 'https://cloud.langfuse.com',
    });
  });

  it('returns CONFIG_INVALID with the offending variable', () => {
    const result = parseConfig({ VISION_TEMPERATURE: 'hot' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('CONFIG_INVALID');
    expect(result.error.retryable).toBe(false);
    expect(result.error.details).toContain('VISION_TEMPERATURE');
  });
});

describe('loadConfig', () => {
  it('throws on invalid configuration', () => {
    expect(() => loadConfig({ RENDER_DPI: '5' })).toThrow(/CONFIG_INVALID/);
  });
});
