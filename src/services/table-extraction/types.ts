import type { TableStrategy } from '../../domain/types.js';
import type { AppError } from '../../domain/errors.js';
import type { Table } from '../../infrastructure/pdf/types.js';
import type { HeuristicFields } from '../patterns/index.js';

export interface TableResult {
  tables: Table[];
  tableCount: number;
  heuristicFields: HeuristicFields;
  extractionMethod: TableStrategy | 'failed';
  strategy: TableStrategy | null;
  error?: AppError;
}
