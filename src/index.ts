export { createDocumentParser, parseDocument, createDefaultDeps } from './services/pipeline/index.js';
export type { DocumentParser, ParseResult, PipelineDeps } from './services/pipeline/index.js';
export type { ValidatedDocument } from './services/validation/index.js';
export { loadConfig, parseConfig, DEFAULT_PIPELINE_CONFIG, DEFAULT_VALIDATION_POLICY } from './infrastructure/config.js';
export type { PipelineConfig, ValidationPolicy, VisionConfig, LangfuseConfig } from './infrastructure/config.js';
export { ErrorCode, createAppError } from './domain/errors.js';
export type { AppError } from './domain/errors.js';
export type { Result } from './domain/result.js';
export { DOCUMENT_KINDS, PAY_FREQUENCIES, PIPELINE_STATES } from './domain/types.js';
export type {
  DocumentKind,
  ErrorRecord,
  PayFrequency,
  PipelineState,
  ProcessingMetadata,
  UnvalidatedRecord,
} from './domain/types.js';
export type {
  Address,
  BenefitCode,
  CalculatedIncome,
  DeductionLine,
  DocumentRecord,
  EarningsLine,
  IncomeTaxInfo,
  PaystubRecord,
  StateLocalLine,
  TaxLine,
  W2Record,
} from './domain/schemas.js';
