import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join } from 'node:path';
import { groupIntoLines, inspectPdf, resolvePages } from '../../src/infrastructure/pdf/document.js';
import { PdfjsPageRenderer } from '../../src/infrastructure/pdf/page-renderer.js';
import { PdfjsTableDetector } from '../../src/infrastructure/pdf/table-detector.js';
import { PdfjsTextReader } from '../../src/infrastructure/pdf/text-reader.js';
import { createTempDir, removeTempDir, writeSamplePdf, writeTextFile } from '../helpers/pdf.js';

const MAX_SIZE = 25 * 1024 * 1024;

let dir: string;
let paystubPath: string;
let notPdfPath: string;
let corruptPath: string;

beforeAll(async () => {
  dir = await createTempDir();
  paystubPath = await writeSamplePdf(dir, 'sample-paystub');
  notPdfPath = await writeTextFile(dir, 'notes.pdf', 'not a pdf at all');
  corruptPath = await writeTextFile(dir, 'corrupt.pdf', '%PDF-1.4\n\u0000\u0001garbage without objects\n');
});

afterAll(async () => {
  await removeTempDir(dir);
});

describe('inspectPdf', () => {
  it('accepts a PDF within the size limit', async () => {
    const result = await inspectPdf(paystubPath, MAX_SIZE);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.sizeBytes).toBeGreaterThan(0);
      expect(result.value.pageCount).toBe(1);
    }
  });

  it('returns PDF_NOT_FOUND for a missing file', async () => {
    const result = await inspectPdf(join(dir, 'missing.pdf'), MAX_SIZE);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_NOT_FOUND');
      expect(result.error.retryable).toBe(false);
    }
  });

  it('returns PDF_NOT_FOUND for a directory', async () => {
    const result = await inspectPdf(dir, MAX_SIZE);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_NOT_FOUND');
    }
  });

  it('returns PDF_UNREADABLE without a PDF header', async () => {
    const result = await inspectPdf(notPdfPath, MAX_SIZE);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_UNREADABLE');
    }
  });

  it('returns PDF_UNREADABLE for a PDF header over a corrupt body', async () => {
    const result = await inspectPdf(corruptPath, MAX_SIZE);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_UNREADABLE');
      expect(result.error.message).toBe('PDF could not be parsed');
    }
  });

  it('returns PDF_TOO_LARGE above the limit', async () => {
    const result = await inspectPdf(paystubPath, 10);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PDF_TOO_LARGE');
    }
  });
});

describe('resolvePages', () => {
  it('expands all and filters out-of-range page numbers', () => {
    expect(resolvePages(3, 'all')).toEqual([1, 2, 3]);
    expect(resolvePages(3, [0, 2, 4, 1.5])).toEqual([2]);
  });
});

describe('groupIntoLines', () => {
  it('orders lines top to bottom and runs left to right', () => {
    const item = (text: string, x: number, y: number) => ({ text, x, y, width: 20, height: 10 });
    const lines = groupIntoLines([item('Pay', 200, 699), item('Net', 50, 680), item('Gross', 50, 700)]);
    expect(lines.map((line) => line.map((i) => i.text))).toEqual([['Gross', 'Pay'], ['Net']]);
  });
});

describe('PdfjsTextReader', () => {
  it('reads the text layer line by line', async () => {
    const result = await new PdfjsTextReader().readText(paystubPath);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value).toHaveLength(1);
    const page = result.value[0];
    expect(page?.pageNumber).toBe(1);
    const lines = page?.text.split('\n') ?? [];
    expect(lines[0]).toBe('Acme Widgets Inc');
    expect(lines).toContain('Employee: Jane Doe');
    expect(lines).toContain('Regular Pay 80.00 56.25 4,500.00 4,500.00');
    expect(page?.charCount).toBe(page?.text.length);
  });

  it('returns TEXT_EXTRACTION_FAILED for a file pdf.js cannot open', async () => {
    const result = await new PdfjsTextReader().readText(notPdfPath);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('TEXT_EXTRACTION_FAILED');
    }
  });
});

describe('PdfjsTableDetector', () => {
  it('finds the ruled table with the lattice strategy', async () => {
    const result = await new PdfjsTableDetector().detectTables(paystubPath, { pages: 'all', strategy: 'lattice' });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value).toHaveLength(1);
    const table = result.value[0];
    expect(table?.strategy).toBe('lattice');
    expect(table?.page).toBe(1);
    expect(table?.rows[0]).toEqual(['Description', 'Hours', 'Rate', 'Current', 'YTD']);
    expect(table?.rows).toContainEqual(['Regular Pay', '80.00', '56.25', '4,500.00', '4,500.00']);
    expect(table?.rows).toContainEqual(['Health Insurance', '', '', '120.00', '120.00']);
  });

  it('returns TABLE_EXTRACTION_FAILED for a file pdf.js cannot open', async () => {
    const result = await new PdfjsTableDetector().detectTables(notPdfPath, { pages: 'all', strategy: 'stream' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('TABLE_EXTRACTION_FAILED');
    }
  });
});

describe('PdfjsPageRenderer', () => {
  it('returns RENDER_FAILED for a file pdf.js cannot open', async () => {
    const result = await new PdfjsPageRenderer().renderFirstPage(notPdfPath, 72);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('RENDER_FAILED');
    }
  });
});
