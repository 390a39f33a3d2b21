import { PipelineStage } from '../stages/stage.interfaces';

/**
 * Machine-readable failure codes carried by processing errors and
 * surfaced in the job's error string.
 */
export type ProcessingErrorCode =
  | 'unsupported_format'
  | 'corrupt_file'
  | 'empty_document'
  | 'schema_mismatch'
  | 'missing_object'
  | 'timeout'
  | 'rate_limited'
  | 'invalid_response'
  | 'unavailable'
  | 'io_error';

/** Base class for errors raised inside pipeline stages. */
export abstract class ProcessingError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    readonly code: ProcessingErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** Retryable: AI timeout or rate limit, network and object-store IO. */
export class TransientProcessingError extends ProcessingError {
  readonly retryable = true;

  constructor(
    code: ProcessingErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(code, message, options);
    this.name = 'TransientProcessingError';
  }
}

/** Never retried: unsupported format, corrupt file, schema mismatch. */
export class PermanentProcessingError extends ProcessingError {
  readonly retryable = false;

  constructor(
    code: ProcessingErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(code, message, options);
    this.name = 'PermanentProcessingError';
  }
}

/**
 * A stage-local error wrapped with the name of the stage it escaped from.
 * The executor collapses it into the job's single error string.
 */
export class StageFailure extends Error {
  constructor(
    readonly stage: PipelineStage,
    readonly cause: unknown,
  ) {
    super(describeStageFailure(stage, cause), { cause });
    this.name = 'StageFailure';
  }
}

/** Raised at a checkpoint once cancellation has been requested for the job. */
export class JobCanceledSignal extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} was canceled`);
    this.name = 'JobCanceledSignal';
  }
}

/** Raised at a checkpoint when the worker's claim has been superseded. */
export class LeaseLostSignal extends Error {
  constructor(readonly jobId: string) {
    super(`Claim on job ${jobId} is no longer held`);
    this.name = 'LeaseLostSignal';
  }
}

export function isTransientError(
  error: unknown,
): error is TransientProcessingError {
  return error instanceof TransientProcessingError;
}

/**
 * `<stage> stage failed: <ErrorName>(<code>): <message>`, or without the
 * code for errors outside the processing taxonomy.
 */
export function describeStageFailure(
  stage: PipelineStage,
  cause: unknown,
): string {
  const prefix = `${stage} stage failed`;
  if (cause instanceof ProcessingError) {
    return `${prefix}: ${cause.name}(${cause.code}): ${cause.message}`;
  }
  if (cause instanceof Error) {
    return `${prefix}: ${cause.name}: ${cause.message}`;
  }
  return `${prefix}: ${String(cause)}`;
}
