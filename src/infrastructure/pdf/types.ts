import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { TableStrategy } from '../../domain/types.js';

/** A run of text with its position in PDF user space (origin bottom-left, y grows upwards). */
export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PageText {
  pageNumber: number;
  text: string;
  charCount: number;
}

export interface Table {
  page: number;
  strategy: TableStrategy;
  /** Share of non-empty cells, 0-100. */
  quality: number;
  rows: string[][];
}

export interface DetectTablesOptions {
  pages: 'all' | number[];
  strategy: TableStrategy;
}

export interface TableDetector {
  detectTables(path: string, options: DetectTablesOptions): Promise<Result<Table[], AppError>>;
}

export interface TextReader {
  readText(path: string): Promise<Result<PageText[], AppError>>;
}

export interface PageRenderer {
  /** JPEG bytes of the first page. */
  renderFirstPage(path: string, dpi: number): Promise<Result<Buffer, AppError>>;
}
