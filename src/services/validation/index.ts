import type { Logger } from 'pino';
import type { DocumentKind, ProcessingMetadata, RawRecord } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import type { ValidationPolicy } from '../../infrastructure/config.js';
import { checkConsistency } from './consistency.js';
import { validateSchema } from './schema-validator.js';
import type { ValidationOutcome } from './types.js';

export type { ValidatedDocument, ValidationOutcome } from './types.js';
export { checkConsistency, checkPaystubConsistency, checkW2Consistency } from './consistency.js';
export { validateSchema } from './schema-validator.js';

const baseLog = logger.child({ module: 'validation' });

export interface RecordAnnotations {
  confidence_score: number;
  processing_metadata: ProcessingMetadata;
}

/**
 * Runs the consistency checks, then the schema. A record that fails the schema
 * is still returned, unvalidated and flagged, so a partial result is never lost.
 */
export function validateRecord(
  kind: DocumentKind,
  fields: RawRecord,
  annotations: RecordAnnotations,
  policy: ValidationPolicy,
  log: Logger = baseLog,
): ValidationOutcome {
  const warnings = checkConsistency(kind, fields, policy);
  const metadata: ProcessingMetadata = {
    ...annotations.processing_metadata,
    validation_method: 'zod',
    validation_warnings_count: warnings.length,
  };
  const candidate = {
    ...fields,
    document_type: kind,
    confidence_score: annotations.confidence_score,
    validation_warnings: warnings,
  };

  const validated = validateSchema(kind, { ...candidate, processing_metadata: metadata });
  if (validated.ok) {
    log.info({ step: 'validating', warningCount: warnings.length }, 'Validation passed');
    return {
      record: {
        ...validated.value,
        processing_metadata: { ...validated.value.processing_metadata, validation_passed: true },
      },
      passed: true,
      warnings,
    };
  }

  const message = validated.error.details ?? validated.error.message;
  log.warn(
    { step: 'validating', errorCode: validated.error.code, details: message, warningCount: warnings.length },
    'Schema validation failed, returning unvalidated record',
  );

  return {
    record: {
      ...candidate,
      processing_metadata: { ...metadata, validation_passed: false, validation_error: message },
    },
    passed: false,
    warnings,
    error: message,
  };
}
