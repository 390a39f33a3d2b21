import { ConfigService } from '@nestjs/config';
import { SheetExtractorOptions } from '@sheetwise/pipeline';
import { ValidationFailurePolicy } from './environment.validation';

/** Injection token for the resolved WorkerSettings */
export const WORKER_SETTINGS = 'WORKER_SETTINGS';

/** Tunables of the worker pool, watchdog and pipeline executor. */
export interface WorkerSettings {
  /** Queue consumer loops; 0 disables job processing on this instance */
  concurrency: number;
  queueBlockMs: number;
  heartbeatIntervalMs: number;
  /** A PROCESSING job silent for longer than this is reclaimed */
  staleAfterMs: number;
  /**
   * A PENDING job untouched for longer than this is enqueued again. Keep
   * it above the queue's visibility timeout: a job merely waiting behind
   * a busy pool is still on the queue.
   */
  pendingStaleAfterMs: number;
  /** Claims allowed per job before the watchdog gives up on it */
  maxAttempts: number;
  watchdogIntervalMs: number;
  shutdownGraceMs: number;

  storageMaxAttempts: number;
  storageRetryBaseDelayMs: number;
  parseTimeoutMs: number;
  validateTimeoutMs: number;
  validationFailurePolicy: ValidationFailurePolicy;
  extraction: SheetExtractorOptions;
}

export function defaultWorkerSettings(): WorkerSettings {
  return {
    concurrency: 2,
    queueBlockMs: 5_000,
    heartbeatIntervalMs: 10_000,
    staleAfterMs: 60_000,
    pendingStaleAfterMs: 300_000,
    maxAttempts: 3,
    watchdogIntervalMs: 15_000,
    shutdownGraceMs: 30_000,
    storageMaxAttempts: 3,
    storageRetryBaseDelayMs: 200,
    parseTimeoutMs: 30_000,
    validateTimeoutMs: 10_000,
    validationFailurePolicy: 'annotate',
    extraction: {
      concurrency: 4,
      maxAttempts: 3,
      baseDelayMs: 1_000,
      maxDelayMs: 30_000,
      callTimeoutMs: 60_000,
      maxRowsPerUnit: 500,
    },
  };
}

export function loadWorkerSettings(config: ConfigService): WorkerSettings {
  const defaults = defaultWorkerSettings();
  const extraction = defaults.extraction;
  const num = (key: string, fallback: number): number =>
    Number(config.get<number>(key, fallback));

  return {
    concurrency: num('WORKER_CONCURRENCY', defaults.concurrency),
    queueBlockMs: num('QUEUE_BLOCK_MS', defaults.queueBlockMs),
    heartbeatIntervalMs: num(
      'HEARTBEAT_INTERVAL_MS',
      defaults.heartbeatIntervalMs,
    ),
    staleAfterMs: num('JOB_STALE_AFTER_MS', defaults.staleAfterMs),
    pendingStaleAfterMs: num(
      'JOB_PENDING_STALE_AFTER_MS',
      defaults.pendingStaleAfterMs,
    ),
    maxAttempts: num('JOB_MAX_ATTEMPTS', defaults.maxAttempts),
    watchdogIntervalMs: num(
      'WATCHDOG_INTERVAL_MS',
      defaults.watchdogIntervalMs,
    ),
    shutdownGraceMs: num(
      'WORKER_SHUTDOWN_GRACE_MS',
      defaults.shutdownGraceMs,
    ),
    storageMaxAttempts: num(
      'STORAGE_MAX_ATTEMPTS',
      defaults.storageMaxAttempts,
    ),
    storageRetryBaseDelayMs: defaults.storageRetryBaseDelayMs,
    parseTimeoutMs: num('PARSE_TIMEOUT_MS', defaults.parseTimeoutMs),
    validateTimeoutMs: num('VALIDATE_TIMEOUT_MS', defaults.validateTimeoutMs),
    validationFailurePolicy:
      config.get<ValidationFailurePolicy>('VALIDATION_FAILURE_POLICY') ??
      defaults.validationFailurePolicy,
    extraction: {
      concurrency: num('EXTRACTION_CONCURRENCY', extraction.concurrency),
      maxAttempts: num('AI_MAX_ATTEMPTS', extraction.maxAttempts),
      baseDelayMs: num('AI_RETRY_BASE_DELAY_MS', extraction.baseDelayMs),
      maxDelayMs: num(
        'AI_RETRY_MAX_DELAY_MS',
        extraction.maxDelayMs ?? 30_000,
      ),
      callTimeoutMs: num('AI_CALL_TIMEOUT_MS', extraction.callTimeoutMs),
      maxRowsPerUnit: num(
        'AI_MAX_ROWS_PER_SHEET',
        extraction.maxRowsPerUnit ?? 500,
      ),
    },
  };
}
