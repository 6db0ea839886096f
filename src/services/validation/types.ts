import type { DocumentRecord } from '../../domain/schemas.js';
import type { UnvalidatedRecord } from '../../domain/types.js';

export type ValidatedDocument = DocumentRecord | UnvalidatedRecord;

export interface ValidationOutcome {
  record: ValidatedDocument;
  passed: boolean;
  warnings: string[];
  error?: string;
}
