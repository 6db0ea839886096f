import type { PipelineConfig } from '../../infrastructure/config.js';
import { createTracer } from '../../infrastructure/langfuse.js';
import { createLLMProvider } from '../../infrastructure/llm/index.js';
import { PdfjsPageRenderer } from '../../infrastructure/pdf/page-renderer.js';
import { PdfjsTableDetector } from '../../infrastructure/pdf/table-detector.js';
import { PdfjsTextReader } from '../../infrastructure/pdf/text-reader.js';
import type { PipelineDeps } from './types.js';

/** Production engines: pdf.js for tables, text and rendering, Groq for vision when a key is set. */
export function createDefaultDeps(config: PipelineConfig): PipelineDeps {
  const { apiKey, model, timeoutMs } = config.vision;
  return {
    tableDetector: new PdfjsTableDetector(),
    textReader: new PdfjsTextReader(),
    pageRenderer: new PdfjsPageRenderer(),
    llm: apiKey ? createLLMProvider({ provider: 'groq', apiKey, model, timeoutMs }) : null,
    tracer: createTracer(config.langfuse),
  };
}
