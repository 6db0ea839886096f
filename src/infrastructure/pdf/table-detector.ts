import { OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFPageProxy } from 'pdfjs-dist/types/src/display/api.js';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { TableStrategy } from '../../domain/types.js';
import { logger } from '../logger.js';
import { groupIntoLines, readPositionedText, resolvePages, withPdf } from './document.js';
import {
  IDENTITY,
  applyMatrix,
  buildGrid,
  connectedRulings,
  fillGrid,
  multiply,
  rectangleRulings,
  streamTables,
  toRuling,
  type Matrix,
  type Ruling,
} from './table-geometry.js';
import type { DetectTablesOptions, PositionedText, Table, TableDetector } from './types.js';

const log = logger.child({ module: 'pdf-table-detector' });

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function toMatrix(value: unknown): Matrix | null {
  if (!isNumberArray(value) || value.length !== 6) return null;
  return [value[0], value[1], value[2], value[3], value[4], value[5]];
}

/**
 * Collects ruling lines from the page's drawing operators, following the
 * graphics state stack so that translated or scaled paths land in user space.
 */
export async function readRulings(page: PDFPageProxy): Promise<Ruling[]> {
  const { fnArray, argsArray } = await page.getOperatorList();
  const rulings: Ruling[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;

  for (let i = 0; i < fnArray.length; i++) {
    const fn = fnArray[i];
    const args: unknown = argsArray[i];

    if (fn === OPS.save) {
      stack.push(ctm);
    } else if (fn === OPS.restore) {
      ctm = stack.pop() ?? IDENTITY;
    } else if (fn === OPS.transform) {
      const matrix = toMatrix(args);
      if (matrix) ctm = multiply(ctm, matrix);
    } else if (fn === OPS.constructPath && Array.isArray(args)) {
      const [subOps, coords] = args;
      if (isNumberArray(subOps) && isNumberArray(coords)) {
        rulings.push(...pathRulings(subOps, coords, ctm));
      }
    }
  }

  return rulings;
}

function pathRulings(subOps: number[], coords: number[], ctm: Matrix): Ruling[] {
  const rulings: Ruling[] = [];
  let cursor = 0;
  let current: [number, number] = [0, 0];
  let subpathStart: [number, number] = [0, 0];

  const lineTo = (next: [number, number]) => {
    const ruling = toRuling(current[0], current[1], next[0], next[1]);
    if (ruling) rulings.push(ruling);
    current = next;
  };

  for (const op of subOps) {
    switch (op) {
      case OPS.moveTo:
        current = applyMatrix(ctm, coords[cursor], coords[cursor + 1]);
        subpathStart = current;
        cursor += 2;
        break;
      case OPS.lineTo:
        lineTo(applyMatrix(ctm, coords[cursor], coords[cursor + 1]));
        cursor += 2;
        break;
      case OPS.curveTo:
        current = applyMatrix(ctm, coords[cursor + 4], coords[cursor + 5]);
        cursor += 6;
        break;
      case OPS.curveTo2:
      case OPS.curveTo3:
        current = applyMatrix(ctm, coords[cursor + 2], coords[cursor + 3]);
        cursor += 4;
        break;
      case OPS.closePath:
        lineTo(subpathStart);
        break;
      case OPS.rectangle: {
        const [x, y, w, h] = coords.slice(cursor, cursor + 4);
        rulings.push(
          ...rectangleRulings([
            applyMatrix(ctm, x, y),
            applyMatrix(ctm, x + w, y),
            applyMatrix(ctm, x, y + h),
            applyMatrix(ctm, x + w, y + h),
          ]),
        );
        cursor += 4;
        break;
      }
      default:
        break;
    }
  }

  return rulings;
}

function latticeTables(pageNumber: number, rulings: Ruling[], items: PositionedText[]): Table[] {
  const tables: Table[] = [];
  for (const group of connectedRulings(rulings)) {
    const grid = buildGrid(group);
    if (!grid) continue;
    const filled = fillGrid(grid, items);
    if (filled) {
      tables.push({ page: pageNumber, strategy: 'lattice', ...filled });
    }
  }
  return tables;
}

/**
 * Table detection over the pdf.js text layer and drawing operators.
 * `lattice` needs ruled cell borders; `stream` infers columns from whitespace.
 */
export class PdfjsTableDetector implements TableDetector {
  async detectTables(
    path: string,
    options: DetectTablesOptions,
  ): Promise<Result<Table[], AppError>> {
    try {
      const tables = await withPdf(path, async (pdf) => {
        const found: Table[] = [];
        for (const pageNumber of resolvePages(pdf.numPages, options.pages)) {
          const page = await pdf.getPage(pageNumber);
          found.push(...(await this.detectOnPage(page, pageNumber, options.strategy)));
        }
        return found;
      });

      log.debug({ path, strategy: options.strategy, tableCount: tables.length }, 'Table detection finished');
      return ok(tables);
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.warn(
        { path, strategy: options.strategy, errorCode: ErrorCode.TABLE_EXTRACTION_FAILED, details },
        'Table detection failed',
      );
      return err(
        createAppError(
          ErrorCode.TABLE_EXTRACTION_FAILED,
          `Table detection with ${options.strategy} strategy failed`,
          false,
          details,
        ),
      );
    }
  }

  private async detectOnPage(
    page: PDFPageProxy,
    pageNumber: number,
    strategy: TableStrategy,
  ): Promise<Table[]> {
    const items = await readPositionedText(page);
    if (strategy === 'lattice') {
      return latticeTables(pageNumber, await readRulings(page), items);
    }
    return streamTables(groupIntoLines(items)).map((table) => ({
      page: pageNumber,
      strategy: 'stream' as const,
      ...table,
    }));
  }
}
