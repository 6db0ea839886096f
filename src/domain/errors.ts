export const ErrorCode = {
  // Input
  PDF_NOT_FOUND: 'PDF_NOT_FOUND',
  PDF_UNREADABLE: 'PDF_UNREADABLE',
  PDF_TOO_LARGE: 'PDF_TOO_LARGE',

  // Extraction stages
  TABLE_EXTRACTION_FAILED: 'TABLE_EXTRACTION_FAILED',
  TEXT_EXTRACTION_FAILED: 'TEXT_EXTRACTION_FAILED',
  RENDER_FAILED: 'RENDER_FAILED',

  // Vision model
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_AUTH_ERROR: 'LLM_AUTH_ERROR',
  LLM_TIMEOUT: 'LLM_TIMEOUT',
  LLM_MALFORMED_RESPONSE: 'LLM_MALFORMED_RESPONSE',
  VISION_RESPONSE_INVALID: 'VISION_RESPONSE_INVALID',
  VISION_DISABLED: 'VISION_DISABLED',

  // Validation
  SCHEMA_VALIDATION_FAILED: 'SCHEMA_VALIDATION_FAILED',

  // Infrastructure
  CONFIG_INVALID: 'CONFIG_INVALID',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

