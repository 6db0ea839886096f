import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { isRecord } from '../../domain/values.js';
import type { DocumentKind, DraftRecord } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import type { GenerationTracer } from '../../infrastructure/langfuse.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import type { VisionConfig } from '../../infrastructure/config.js';
import { buildProcessingMetadata } from '../extraction/metadata.js';
import type { TableResult } from '../table-extraction/index.js';
import type { TextResult } from '../text-extraction/index.js';
import { buildInstruction } from './instructions.js';

export { buildInstruction } from './instructions.js';

const baseLog = logger.child({ module: 'vision' });

/** Self-reported scores from the model; the pipeline computes its own. */
const MODEL_SCORE_FIELDS = ['confidence_score', 'extraction_confidence', 'confidence'] as const;

export interface VisionDeps {
  llm: LLMProvider;
  tracer: GenerationTracer;
  options: Pick<VisionConfig, 'temperature' | 'maxTokens' | 'timeoutMs'>;
}

/**
 * Decodes the JSON object embedded in a model answer: everything from the
 * first `{` to the last `}`. Prose or code fences around it are ignored.
 */
export function parseVisionResponse(text: string): Result<Record<string, unknown>, AppError> {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return err(createAppError(ErrorCode.VISION_RESPONSE_INVALID, 'Vision response contains no JSON object', false));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    return err(
      createAppError(ErrorCode.VISION_RESPONSE_INVALID, 'Vision response is not valid JSON', false, details),
    );
  }

  if (!isRecord(parsed)) {
    return err(createAppError(ErrorCode.VISION_RESPONSE_INVALID, 'Vision response is not a JSON object', false));
  }
  return ok(parsed);
}

function withoutModelScores(fields: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(fields).filter(
      ([key]) => key !== 'processing_metadata' && !MODEL_SCORE_FIELDS.some((field) => field === key),
    ),
  );
}

/**
 * Sends the instruction and the first page image to the vision model once and
 * turns its answer into a draft record. Any failure (the call, the timeout or
 * an unreadable answer) comes back as an error for the caller to fall back on.
 */
export async function enhance(
  kind: DocumentKind,
  tableResult: TableResult,
  textResult: TextResult,
  image: Buffer | null,
  deps: VisionDeps,
  documentId?: string,
  log: Logger = baseLog,
): Promise<Result<DraftRecord, AppError>> {
  const instruction = buildInstruction(kind, tableResult, textResult);
  const startTime = new Date();

  log.info({ model: deps.llm.model, withImage: image !== null }, 'Requesting vision extraction');

  const response = await deps.llm.complete(instruction, image, {
    temperature: deps.options.temperature,
    maxTokens: deps.options.maxTokens,
    timeoutMs: deps.options.timeoutMs,
  });
  if (!response.ok) return response;

  deps.tracer.traceGeneration({
    traceId: documentId ?? randomUUID(),
    name: `vision-${kind}`,
    model: response.value.model,
    input: instruction,
    output: response.value.content,
    startTime,
    endTime: new Date(),
    metadata: { documentKind: kind, withImage: image !== null, tablesFound: tableResult.tableCount },
  });

  const parsed = parseVisionResponse(response.value.content);
  if (!parsed.ok) {
    log.warn({ errorCode: parsed.error.code, details: parsed.error.details }, 'Vision response unusable');
    return parsed;
  }

  log.info(
    { model: response.value.model, latencyMs: response.value.latencyMs, fieldCount: Object.keys(parsed.value).length },
    'Vision extraction succeeded',
  );

  return ok({
    fields: { ...withoutModelScores(parsed.value), document_type: kind },
    metadata: buildProcessingMetadata(tableResult, textResult, { used: true, model: response.value.model }),
  });
}
