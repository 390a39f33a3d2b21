/**
 * Status of an extraction job.
 *
 * Transitions:
 *   PENDING → PROCESSING → COMPLETED
 *                        → FAILED
 *                        → CANCELED
 *   PENDING → CANCELED
 *
 * COMPLETED, FAILED and CANCELED are terminal. A document may have many jobs
 * over its lifetime, but at most one in PENDING or PROCESSING.
 */
export enum JobStatus {
  /** Created and enqueued, not yet claimed by a worker */
  PENDING = 'pending',

  /** Claimed by a worker (or lease released and awaiting redelivery) */
  PROCESSING = 'processing',

  /** Pipeline finished; exactly one Extraction exists */
  COMPLETED = 'completed',

  /** Pipeline or infrastructure failure (see errorMessage) */
  FAILED = 'failed',

  /** Canceled before or during processing */
  CANCELED = 'canceled',
}

export const ACTIVE_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.PENDING,
  JobStatus.PROCESSING,
];

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = [
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.CANCELED,
];

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}
