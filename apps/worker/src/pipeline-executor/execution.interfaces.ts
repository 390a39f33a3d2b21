import { NewExtraction } from '@sheetwise/database';
import { PipelineStage, StageFailure } from '@sheetwise/pipeline';

/**
 * Callbacks the worker pool provides for one claimed job. They are how
 * the executor observes cancellation and reports progress without
 * touching the job store itself.
 */
export interface ExecutionHooks {
  /** Throws JobCanceledSignal or LeaseLostSignal when the job must stop */
  checkpoint(): Promise<void>;
  reportProgress(
    stage: PipelineStage,
    percent: number,
    message: string,
  ): Promise<void>;
}

export type ExecutionOutcome =
  | { kind: 'completed'; extraction: NewExtraction }
  | { kind: 'failed'; failure: StageFailure }
  | { kind: 'canceled' }
  /** The claim was superseded; nothing may be written for this attempt */
  | { kind: 'lost' };

/** Progress percentages at which each stage starts and ends */
export const STAGE_PROGRESS = {
  parse: { start: 0, end: 30 },
  extract: { start: 30, end: 80 },
  validate: { start: 80, end: 100 },
} as const satisfies Record<PipelineStage, { start: number; end: number }>;
