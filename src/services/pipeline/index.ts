import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { asArray, isRecord } from '../../domain/values.js';
import type { DocumentKind, DraftRecord, ErrorRecord, PipelineState, RawRecord } from '../../domain/types.js';
import { DEFAULT_PIPELINE_CONFIG, parseConfig, type PipelineConfig } from '../../infrastructure/config.js';
import { createDocumentLogger } from '../../infrastructure/logger.js';
import { inspectPdf } from '../../infrastructure/pdf/document.js';
import { categorizeEarnings, markPreTaxDeductions } from '../categorizer/index.js';
import { computeConfidence, formatHeuristicRecord } from '../extraction/index.js';
import { calculateIncome, calculateMonthlyQualifyingIncome } from '../income/index.js';
import { extractTables, type TableResult } from '../table-extraction/index.js';
import { extractText, type TextResult } from '../text-extraction/index.js';
import { validateRecord } from '../validation/index.js';
import { enhance } from '../vision/index.js';
import { createDefaultDeps } from './deps.js';
import { PipelineRun } from './state-machine.js';
import type { DocumentParser, ParseResult, PipelineDeps } from './types.js';

export type { DocumentParser, ParseResult, PipelineDeps } from './types.js';
export { PipelineRun, canTransition } from './state-machine.js';
export { createDefaultDeps } from './deps.js';

function describeError(error: AppError): string {
  return error.details ? `${error.message}: ${error.details}` : error.message;
}

function errorRecord(kind: DocumentKind, message: string): ErrorRecord {
  return { error: message, document_type: kind, status: 'failed', confidence_score: 0 };
}

function categorize(kind: DocumentKind, fields: RawRecord): RawRecord {
  if (kind !== 'paystub') return fields;
  return {
    ...fields,
    earnings: categorizeEarnings(asArray(fields.earnings).filter(isRecord)),
    deductions: markPreTaxDeductions(asArray(fields.deductions).filter(isRecord)),
  };
}

function deriveIncome(kind: DocumentKind, fields: RawRecord): RawRecord {
  if (kind === 'w2') {
    return { ...fields, calculated_income: calculateIncome(fields.income_tax_info) };
  }
  const monthly = calculateMonthlyQualifyingIncome(fields.gross_pay_current, fields.pay_frequency);
  return {
    ...fields,
    monthly_qualifying_income: monthly?.monthlyIncome ?? null,
    income_basis: monthly?.basis ?? null,
  };
}

function withPipelineStates<T extends { processing_metadata: object }>(record: T, states: PipelineState[]): T {
  return { ...record, processing_metadata: { ...record.processing_metadata, pipeline_states: states } };
}

/**
 * Builds the document parser. Each `parse` walks the fixed stage sequence
 * (tables, text, vision, categorize, score, validate) and always resolves:
 * stage failures fall back, and only an unreadable input file or an
 * unexpected exception yields the error-shaped record.
 */
export function createDocumentParser(
  deps: PipelineDeps,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
): DocumentParser {
  async function attemptVision(
    kind: DocumentKind,
    path: string,
    tableResult: TableResult,
    textResult: TextResult,
    documentId: string,
    log: Logger,
  ): Promise<Result<DraftRecord, AppError>> {
    const { llm } = deps;
    if (!llm) {
      return err(createAppError(ErrorCode.VISION_DISABLED, 'Vision model is not configured', false));
    }

    try {
      const rendered = await deps.pageRenderer.renderFirstPage(path, config.renderDpi);
      if (!rendered.ok) {
        log.warn({ errorCode: rendered.error.code }, 'First page not rendered, sending instruction without image');
      }

      return await enhance(
        kind,
        tableResult,
        textResult,
        rendered.ok ? rendered.value : null,
        { llm, tracer: deps.tracer, options: config.vision },
        documentId,
        log,
      );
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      return err(createAppError(ErrorCode.LLM_API_ERROR, 'Vision stage raised an exception', false, details));
    }
  }

  async function parse(path: string, kind: DocumentKind): Promise<ParseResult> {
    const documentId = randomUUID();
    const log = createDocumentLogger(documentId, kind);
    const run = new PipelineRun();
    const startTime = Date.now();

    log.info({ path, step: run.current }, 'Parsing document');

    try {
      const input = await inspectPdf(path, config.maxPdfSizeBytes);
      if (!input.ok) {
        run.fail();
        log.error({ path, errorCode: input.error.code, retryable: false }, 'Input rejected');
        return errorRecord(kind, describeError(input.error));
      }
      log.debug({ sizeBytes: input.value.sizeBytes, pageCount: input.value.pageCount }, 'Input accepted');

      const tableResult = await extractTables(path, deps.tableDetector, kind, log);
      run.advance('table_extracted');

      const textResult = await extractText(path, deps.textReader, kind, log);
      run.advance('text_extracted');

      run.advance('vision_attempted');
      const vision = await attemptVision(kind, path, tableResult, textResult, documentId, log);

      let draft: DraftRecord;
      if (vision.ok) {
        run.advance('vision_succeeded');
        draft = vision.value;
      } else {
        run.advance('vision_failed');
        log.warn({ errorCode: vision.error.code, step: run.current }, 'Vision stage failed, using heuristic fallback');
        draft = formatHeuristicRecord(kind, tableResult, textResult, describeError(vision.error));
      }

      const fields = deriveIncome(kind, categorize(kind, draft.fields));
      run.advance('categorized');

      const confidence = computeConfidence(kind, { ...fields, processing_metadata: draft.metadata });
      run.advance('scored');

      const outcome = validateRecord(
        kind,
        fields,
        { confidence_score: confidence.score, processing_metadata: draft.metadata },
        config.validation,
        log,
      );
      run.advance('validated');
      run.advance('done');

      log.info(
        {
          step: run.current,
          confidence: confidence.score,
          visionUsed: draft.metadata.gpt_vision_used,
          validationPassed: outcome.passed,
          warningCount: outcome.warnings.length,
          durationMs: Date.now() - startTime,
        },
        'Document parsed',
      );

      return withPipelineStates(outcome.record, run.states);
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.error({ path, step: run.current, details }, 'Pipeline failed');
      run.fail();
      return errorRecord(kind, details);
    }
  }

  async function parseBatch(paths: readonly string[], kind: DocumentKind): Promise<ParseResult[]> {
    const results: ParseResult[] = [];
    for (const path of paths) {
      results.push(await parse(path, kind));
    }
    return results;
  }

  return { parse, parseBatch };
}

/**
 * Parses one document with configuration from the environment and the
 * production engines. Invalid configuration yields the error-shaped record.
 */
export async function parseDocument(
  path: string,
  kind: DocumentKind,
  env: Record<string, string | undefined> = process.env,
): Promise<ParseResult> {
  const config = parseConfig(env);
  if (!config.ok) {
    return errorRecord(kind, describeError(config.error));
  }

  const deps = createDefaultDeps(config.value);
  try {
    return await createDocumentParser(deps, config.value).parse(path, kind);
  } finally {
    await deps.tracer.flush();
  }
}
