import type { ProcessingMetadata } from '../../domain/types.js';
import type { TableResult } from '../table-extraction/index.js';
import type { TextResult } from '../text-extraction/index.js';

export interface VisionSummary {
  used: boolean;
  model?: string;
  error?: string;
}

/** Metadata describing which sources fed a record. `pipeline_states` is filled in when the run ends. */
export function buildProcessingMetadata(
  tableResult: TableResult,
  textResult: TextResult,
  vision: VisionSummary,
): ProcessingMetadata {
  return {
    extraction_method: vision.used ? 'multi_modal_ai_enhanced' : 'traditional_extraction_only',
    gpt_vision_used: vision.used,
    tables_found: tableResult.tableCount,
    table_strategy: tableResult.strategy,
    text_length: textResult.fullText.length,
    page_count: textResult.pageCount,
    pipeline_states: [],
    ...(vision.model !== undefined && { vision_model: vision.model }),
    ...(vision.error !== undefined && { vision_error: vision.error }),
  };
}
