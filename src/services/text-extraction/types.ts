import type { AppError } from '../../domain/errors.js';
import type { PageText } from '../../infrastructure/pdf/types.js';
import type { HeuristicFields } from '../patterns/index.js';

export interface TextResult {
  fullText: string;
  pages: PageText[];
  pageCount: number;
  heuristicFields: HeuristicFields;
  extractionMethod: 'text_layer' | 'failed';
  error?: AppError;
}
