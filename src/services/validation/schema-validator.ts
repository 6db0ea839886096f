import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { paystubRecordSchema, w2RecordSchema, type DocumentRecord } from '../../domain/schemas.js';
import type { DocumentKind, RawRecord } from '../../domain/types.js';

/**
 * Parses a raw record into its typed shape. Printed amounts are coerced to
 * numbers, dates and pay frequencies normalized, negative amounts dropped.
 */
export function validateSchema(kind: DocumentKind, raw: RawRecord): Result<DocumentRecord, AppError> {
  const parsed = kind === 'w2' ? w2RecordSchema.safeParse(raw) : paystubRecordSchema.safeParse(raw);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const details = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return err(
    createAppError(ErrorCode.SCHEMA_VALIDATION_FAILED, `Record does not match the ${kind} schema`, false, details),
  );
}
