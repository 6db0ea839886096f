import type { ErrorRecord } from '../../domain/types.js';
import type { GenerationTracer } from '../../infrastructure/langfuse.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import type { PageRenderer, TableDetector, TextReader } from '../../infrastructure/pdf/types.js';
import type { DocumentKind } from '../../domain/types.js';
import type { ValidatedDocument } from '../validation/index.js';

/** External engines the pipeline drives. A null `llm` disables the vision stage. */
export interface PipelineDeps {
  tableDetector: TableDetector;
  textReader: TextReader;
  pageRenderer: PageRenderer;
  llm: LLMProvider | null;
  tracer: GenerationTracer;
}

export type ParseResult = ValidatedDocument | ErrorRecord;

export interface DocumentParser {
  parse(path: string, kind: DocumentKind): Promise<ParseResult>;
  /** Parses one document after another; runs never overlap. */
  parseBatch(paths: readonly string[], kind: DocumentKind): Promise<ParseResult[]>;
}
