import { ErrorCode } from '../../domain/errors.js';
import type { PipelineState } from '../../domain/types.js';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  start: ['table_extracted', 'failed'],
  table_extracted: ['text_extracted', 'failed'],
  text_extracted: ['vision_attempted', 'failed'],
  vision_attempted: ['vision_succeeded', 'vision_failed', 'failed'],
  vision_succeeded: ['categorized', 'failed'],
  vision_failed: ['categorized', 'failed'],
  categorized: ['scored', 'failed'],
  scored: ['validated', 'failed'],
  validated: ['done', 'failed'],
  done: [],
  failed: [],
};

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Tracks one document's walk through the pipeline and rejects any skipped or repeated step. */
export class PipelineRun {
  private readonly visited: PipelineState[] = ['start'];

  get current(): PipelineState {
    return this.visited[this.visited.length - 1] ?? 'start';
  }

  get states(): PipelineState[] {
    return [...this.visited];
  }

  advance(next: PipelineState): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`[${ErrorCode.INVALID_STATE_TRANSITION}] Cannot move from ${this.current} to ${next}`);
    }
    this.visited.push(next);
  }

  /** Moves to `failed` from any state that is not already terminal. */
  fail(): void {
    if (canTransition(this.current, 'failed')) {
      this.visited.push('failed');
    }
  }
}
