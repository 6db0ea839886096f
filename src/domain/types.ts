export const DOCUMENT_KINDS = ['paystub', 'w2'] as const;

export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

export const PIPELINE_STATES = [
  'start',
  'table_extracted',
  'text_extracted',
  'vision_attempted',
  'vision_succeeded',
  'vision_failed',
  'categorized',
  'scored',
  'validated',
  'done',
  'failed',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export const PAY_FREQUENCIES = [
  'weekly',
  'bi-weekly',
  'semi-monthly',
  'monthly',
  'quarterly',
  'annual',
  'unknown',
] as const;

export type PayFrequency = (typeof PAY_FREQUENCIES)[number];

export const TABLE_STRATEGIES = ['lattice', 'stream'] as const;

export type TableStrategy = (typeof TABLE_STRATEGIES)[number];

export type ExtractionMethod =
  | 'multi_modal_ai_enhanced'
  | 'traditional_extraction_only';

/** Untyped record as produced by the vision model or the heuristic formatter, before schema validation. */
export type RawRecord = Record<string, unknown>;

export interface ProcessingMetadata {
  extraction_method: ExtractionMethod;
  gpt_vision_used: boolean;
  tables_found: number;
  table_strategy: TableStrategy | null;
  text_length: number;
  page_count: number;
  pipeline_states: PipelineState[];
  detected_amounts?: number[];
  detected_dates?: string[];
  vision_model?: string;
  vision_error?: string;
  validation_passed?: boolean;
  validation_error?: string;
  validation_method?: 'zod';
  validation_warnings_count?: number;
}

export interface ErrorRecord {
  error: string;
  document_type: DocumentKind;
  status: 'failed';
  confidence_score: 0;
}

/** Record returned when schema validation failed: the raw shape plus the pipeline's own annotations. */
export interface UnvalidatedRecord extends RawRecord {
  document_type: DocumentKind;
  confidence_score: number;
  validation_warnings: string[];
  processing_metadata: ProcessingMetadata;
}

/** A record under construction: extracted fields plus the metadata the pipeline owns. */
export interface DraftRecord {
  fields: RawRecord;
  metadata: ProcessingMetadata;
}
