import type { Logger } from 'pino';
import { TABLE_STRATEGIES, type DocumentKind, type TableStrategy } from '../../domain/types.js';
import type { AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { Table, TableDetector } from '../../infrastructure/pdf/types.js';
import { emptyHeuristicFields, matchFields, mergeHeuristicFields } from '../patterns/index.js';
import type { TableResult } from './types.js';

export type { TableResult } from './types.js';

const baseLog = logger.child({ module: 'table-extraction' });

export function flattenTable(table: Table): string {
  return table.rows.map((row) => row.join(' | ')).join('\n');
}

function hasContent(table: Table): boolean {
  return table.rows.some((row) => row.some((cell) => cell.trim().length > 0));
}

function failedResult(error?: AppError): TableResult {
  return {
    tables: [],
    tableCount: 0,
    heuristicFields: emptyHeuristicFields(),
    extractionMethod: 'failed',
    strategy: null,
    ...(error !== undefined && { error }),
  };
}

/**
 * Detects tables with the ruled strategy first and falls back to the
 * whitespace strategy; the first one that finds a table wins. Never rejects:
 * total failure is reported as `extractionMethod: 'failed'`.
 */
export async function extractTables(
  path: string,
  detector: TableDetector,
  kind?: DocumentKind,
  log: Logger = baseLog,
): Promise<TableResult> {
  let lastError: AppError | undefined;

  for (const strategy of TABLE_STRATEGIES) {
    const detected = await detector.detectTables(path, { pages: 'all', strategy });
    if (!detected.ok) {
      lastError = detected.error;
      log.warn({ strategy, errorCode: detected.error.code }, 'Table strategy failed, trying next');
      continue;
    }
    if (detected.value.length === 0) {
      log.debug({ strategy }, 'Table strategy found no tables');
      continue;
    }
    return summarize(detected.value, strategy, kind, log);
  }

  log.info({ errorCode: lastError?.code }, 'No tables extracted');
  return failedResult(lastError);
}

function summarize(tables: Table[], strategy: TableStrategy, kind: DocumentKind | undefined, log: Logger): TableResult {
  const heuristicFields = tables
    .filter(hasContent)
    .reduce((merged, table) => mergeHeuristicFields(merged, matchFields(flattenTable(table), kind)), emptyHeuristicFields());

  log.info(
    { strategy, tableCount: tables.length, detectedAmounts: heuristicFields.detectedAmounts.length },
    'Tables extracted',
  );

  return {
    tables,
    tableCount: tables.length,
    heuristicFields,
    extractionMethod: strategy,
    strategy,
  };
}
