import { vi } from 'vitest';
import { ok, err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import type { GenerationTracer } from '../../src/infrastructure/langfuse.js';
import type { LLMProvider, LLMResponse } from '../../src/infrastructure/llm/types.js';
import type { PageRenderer, PageText, Table, TableDetector, TextReader } from '../../src/infrastructure/pdf/types.js';
import type { TableStrategy } from '../../src/domain/types.js';

export function fakeTableDetector(byStrategy: Partial<Record<TableStrategy, Table[]>> = {}): TableDetector {
  return {
    detectTables: vi.fn(async (_path: string, options: { strategy: TableStrategy }) =>
      ok(byStrategy[options.strategy] ?? []),
    ),
  };
}

export function failingTableDetector(): TableDetector {
  return {
    detectTables: vi.fn(async () =>
      err(createAppError(ErrorCode.TABLE_EXTRACTION_FAILED, 'Table detection failed', false)),
    ),
  };
}

export function fakeTextReader(...pages: string[]): TextReader {
  return {
    readText: vi.fn(async () =>
      ok(pages.map((text, i): PageText => ({ pageNumber: i + 1, text, charCount: text.length }))),
    ),
  };
}

export function failingTextReader(): TextReader {
  return {
    readText: vi.fn(async () =>
      err(createAppError(ErrorCode.TEXT_EXTRACTION_FAILED, 'Failed to read PDF text layer', false)),
    ),
  };
}

export function fakePageRenderer(): PageRenderer {
  return {
    renderFirstPage: vi.fn(async () => ok(Buffer.from('jpeg-bytes'))),
  };
}

export function llmResponse(content: string): LLMResponse {
  return {
    content,
    model: 'test-vision-model',
    usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 },
    latencyMs: 5,
  };
}

export function fakeLLM(content: string): LLMProvider {
  return {
    model: 'test-vision-model',
    complete: vi.fn(async () => ok(llmResponse(content))),
  };
}

export function failingLLM(): LLMProvider {
  return {
    model: 'test-vision-model',
    complete: vi.fn(async () =>
      err(createAppError(ErrorCode.LLM_TIMEOUT, 'Groq API request timed out', true, 'Request timed out.')),
    ),
  };
}

export function fakeTracer(): GenerationTracer {
  return {
    traceGeneration: vi.fn(),
    flush: vi.fn(async () => undefined),
  };
}

export function table(rows: string[][], strategy: TableStrategy = 'lattice'): Table {
  return { page: 1, strategy, quality: 100, rows };
}
