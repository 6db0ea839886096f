import { z } from 'zod';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import { err, ok, type Result } from '../domain/result.js';
import { DEFAULT_VISION_MODEL } from './llm/index.js';

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  GROQ_API_KEY: optionalSecret,
  VISION_MODEL: z.string().min(1).default(DEFAULT_VISION_MODEL),
  VISION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  VISION_MAX_TOKENS: z.coerce.number().int().positive().default(3000),
  VISION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  RENDER_DPI: z.coerce.number().int().min(36).max(600).default(200),
  MAX_PDF_SIZE_MB: z.coerce.number().positive().default(25),
  EARNINGS_TOLERANCE_FLOOR: z.coerce.number().nonnegative().default(100),
  EARNINGS_TOLERANCE_RATIO: z.coerce.number().min(0).max(1).default(0.05),
  GROSS_PLAUSIBLE_MIN: z.coerce.number().nonnegative().default(100),
  GROSS_PLAUSIBLE_MAX: z.coerce.number().positive().default(50_000),
  LANGFUSE_PUBLIC_KEY: optionalSecret,
  LANGFUSE_SECRET_KEY: optionalSecret,
  LANGFUSE_BASE_URL: z.string().url().default('https://cloud.langfuse.com'),
});

/** Tunable thresholds of the consistency checks. */
export interface ValidationPolicy {
  earningsToleranceFloor: number;
  earningsToleranceRatio: number;
  grossPlausibleMin: number;
  grossPlausibleMax: number;
}

export const DEFAULT_VALIDATION_POLICY: Readonly<ValidationPolicy> = Object.freeze({
  earningsToleranceFloor: 100,
  earningsToleranceRatio: 0.05,
  grossPlausibleMin: 100,
  grossPlausibleMax: 50_000,
});

export interface VisionConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface LangfuseConfig {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
}

export interface PipelineConfig {
  vision: VisionConfig;
  renderDpi: number;
  maxPdfSizeBytes: number;
  validation: ValidationPolicy;
  langfuse?: LangfuseConfig;
}

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze({
  vision: {
    model: DEFAULT_VISION_MODEL,
    temperature: 0.1,
    maxTokens: 3000,
    timeoutMs: 60_000,
  },
  renderDpi: 200,
  maxPdfSizeBytes: 25 * 1024 * 1024,
  validation: DEFAULT_VALIDATION_POLICY,
});

export function parseConfig(
  env: Record<string, string | undefined>,
): Result<PipelineConfig, AppError> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'Invalid pipeline configuration', false, details));
  }

  const values = parsed.data;
  const langfuse = values.LANGFUSE_PUBLIC_KEY && values.LANGFUSE_SECRET_KEY
    ? {
        publicKey: values.LANGFUSE_PUBLIC_KEY,
        secretKey: values.LANGFUSE_SECRET_KEY,
        baseUrl: values.LANGFUSE_BASE_URL,
      }
    : undefined;

  return ok({
    vision: {
      apiKey: values.GROQ_API_KEY,
      model: values.VISION_MODEL,
      temperature: values.VISION_TEMPERATURE,
      maxTokens: values.VISION_MAX_TOKENS,
      timeoutMs: values.VISION_TIMEOUT_MS,
    },
    renderDpi: values.RENDER_DPI,
    maxPdfSizeBytes: Math.round(values.MAX_PDF_SIZE_MB * 1024 * 1024),
    validation: {
      earningsToleranceFloor: values.EARNINGS_TOLERANCE_FLOOR,
      earningsToleranceRatio: values.EARNINGS_TOLERANCE_RATIO,
      grossPlausibleMin: values.GROSS_PLAUSIBLE_MIN,
      grossPlausibleMax: values.GROSS_PLAUSIBLE_MAX,
    },
    ...(langfuse !== undefined && { langfuse }),
  });
}

/** @throws {Error} If any environment variable fails validation */
export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const result = parseConfig(env);
  if (!result.ok) {
    throw new Error(`[${result.error.code}] ${result.error.message}: ${result.error.details ?? ''}`);
  }
  return result.value;
}
