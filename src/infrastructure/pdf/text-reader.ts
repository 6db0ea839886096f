import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { groupIntoLines, readPositionedText, withPdf } from './document.js';
import type { PageText, TextReader } from './types.js';

const log = logger.child({ module: 'pdf-text-reader' });

/**
 * Reads the text layer of every page, keeping line structure so that
 * label/value pairs ("Gross Pay  4,500.00") stay on one line.
 */
export class PdfjsTextReader implements TextReader {
  async readText(path: string): Promise<Result<PageText[], AppError>> {
    try {
      const pages = await withPdf(path, async (pdf) => {
        const result: PageText[] = [];
        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
          const page = await pdf.getPage(pageNumber);
          const lines = groupIntoLines(await readPositionedText(page));
          const text = lines
            .map((line) => line.map((item) => item.text.trim()).join(' '))
            .join('\n');
          result.push({ pageNumber, text, charCount: text.length });
        }
        return result;
      });

      log.debug({ path, pageCount: pages.length }, 'PDF text layer read');
      return ok(pages);
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.warn({ path, errorCode: ErrorCode.TEXT_EXTRACTION_FAILED, details }, 'Failed to read PDF text');
      return err(
        createAppError(ErrorCode.TEXT_EXTRACTION_FAILED, 'Failed to read PDF text layer', false, details),
      );
    }
  }
}
