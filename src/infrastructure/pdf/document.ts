import { createRequire } from 'node:module';
import { open, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy, PDFPageProxy, TextItem } from 'pdfjs-dist/types/src/display/api.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { PositionedText } from './types.js';

const require = createRequire(import.meta.url);
const STANDARD_FONT_DATA_URL = join(
  require.resolve('pdfjs-dist/package.json'),
  '../standard_fonts/',
);

const PDF_MAGIC = '%PDF-';

const log = logger.child({ module: 'pdf-document' });

export interface PdfFileInfo {
  sizeBytes: number;
  pageCount: number;
}

export interface OpenPdfOptions {
  CanvasFactory?: new () => object;
}

/**
 * Checks that the file exists, fits the size limit, carries a PDF header and
 * opens in pdf.js. This is the only check whose failure is fatal to a parse.
 */
export async function inspectPdf(
  path: string,
  maxSizeBytes: number,
): Promise<Result<PdfFileInfo, AppError>> {
  let sizeBytes: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return err(createAppError(ErrorCode.PDF_NOT_FOUND, `Not a file: ${path}`, false));
    }
    sizeBytes = info.size;
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ path, errorCode: ErrorCode.PDF_NOT_FOUND, retryable: false, details }, 'PDF not found');
    return err(createAppError(ErrorCode.PDF_NOT_FOUND, `Cannot open PDF: ${path}`, false, details));
  }

  if (sizeBytes > maxSizeBytes) {
    log.error(
      { path, errorCode: ErrorCode.PDF_TOO_LARGE, retryable: false, sizeBytes },
      'PDF exceeds size limit',
    );
    return err(
      createAppError(
        ErrorCode.PDF_TOO_LARGE,
        `PDF size ${sizeBytes} bytes exceeds ${maxSizeBytes} byte limit`,
        false,
      ),
    );
  }

  try {
    const handle = await open(path, 'r');
    try {
      const header = Buffer.alloc(PDF_MAGIC.length);
      await handle.read(header, 0, PDF_MAGIC.length, 0);
      if (header.toString('latin1') !== PDF_MAGIC) {
        log.error({ path, errorCode: ErrorCode.PDF_UNREADABLE, retryable: false }, 'File is not a PDF');
        return err(createAppError(ErrorCode.PDF_UNREADABLE, 'File does not have a PDF header', false));
      }
    } finally {
      await handle.close();
    }
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ path, errorCode: ErrorCode.PDF_UNREADABLE, retryable: false, details }, 'Failed to read PDF');
    return err(createAppError(ErrorCode.PDF_UNREADABLE, 'Failed to read PDF file', false, details));
  }

  let pageCount: number;
  try {
    pageCount = await withPdf(path, async (pdf) => pdf.numPages);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ path, errorCode: ErrorCode.PDF_UNREADABLE, retryable: false, details }, 'PDF could not be parsed');
    return err(createAppError(ErrorCode.PDF_UNREADABLE, 'PDF could not be parsed', false, details));
  }

  return ok({ sizeBytes, pageCount });
}

/**
 * Opens the document, hands it to `use`, and always releases the pdf.js
 * resources afterwards. Errors from either step propagate to the caller.
 */
export async function withPdf<T>(
  path: string,
  use: (pdf: PDFDocumentProxy) => Promise<T>,
  options: OpenPdfOptions = {},
): Promise<T> {
  const buffer = await readFile(path);
  const pdf = await getDocument({
    data: new Uint8Array(buffer),
    standardFontDataUrl: STANDARD_FONT_DATA_URL,
    isEvalSupported: false,
    ...(options.CanvasFactory !== undefined && { CanvasFactory: options.CanvasFactory }),
  }).promise;

  try {
    return await use(pdf);
  } finally {
    await pdf.destroy();
  }
}

export function resolvePages(pageCount: number, pages: 'all' | number[]): number[] {
  if (pages === 'all') {
    return Array.from({ length: pageCount }, (_, i) => i + 1);
  }
  return pages.filter((n) => Number.isInteger(n) && n >= 1 && n <= pageCount);
}

export async function readPositionedText(page: PDFPageProxy): Promise<PositionedText[]> {
  const content = await page.getTextContent();
  return content.items
    .filter((item): item is TextItem => 'str' in item)
    .filter((item) => item.str.trim().length > 0)
    .map((item) => ({
      text: item.str,
      x: item.transform[4],
      y: item.transform[5],
      width: item.width,
      height: item.height > 0 ? item.height : Math.abs(item.transform[3]),
    }));
}

/**
 * Groups text runs into visual lines: top to bottom, then left to right.
 * Runs whose baselines differ by less than `tolerance` share a line.
 */
export function groupIntoLines(items: PositionedText[], tolerance = 3): PositionedText[][] {
  const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);
  const lines: Array<{ y: number; items: PositionedText[] }> = [];

  for (const item of sorted) {
    const line = lines.find((l) => Math.abs(l.y - item.y) < tolerance);
    if (line) {
      line.items.push(item);
    } else {
      lines.push({ y: item.y, items: [item] });
    }
  }

  return lines
    .sort((a, b) => b.y - a.y)
    .map((l) => l.items.sort((a, b) => a.x - b.x));
}
