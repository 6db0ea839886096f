import type { Logger } from 'pino';
import type { DocumentKind } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import type { TextReader } from '../../infrastructure/pdf/types.js';
import { emptyHeuristicFields, matchFields } from '../patterns/index.js';
import type { TextResult } from './types.js';

export type { TextResult } from './types.js';

const baseLog = logger.child({ module: 'text-extraction' });

/** Reads every page's text and runs the pattern matcher over the whole document. Never rejects. */
export async function extractText(
  path: string,
  reader: TextReader,
  kind?: DocumentKind,
  log: Logger = baseLog,
): Promise<TextResult> {
  const read = await reader.readText(path);
  if (!read.ok) {
    log.warn({ errorCode: read.error.code }, 'Text extraction failed');
    return {
      fullText: '',
      pages: [],
      pageCount: 0,
      heuristicFields: emptyHeuristicFields(),
      extractionMethod: 'failed',
      error: read.error,
    };
  }

  const pages = read.value;
  const fullText = pages.map((page) => page.text).join('\n');
  const heuristicFields = matchFields(fullText, kind);

  log.info({ pageCount: pages.length, textLength: fullText.length }, 'Text extracted');

  return {
    fullText,
    pages,
    pageCount: pages.length,
    heuristicFields,
    extractionMethod: 'text_layer',
  };
}
