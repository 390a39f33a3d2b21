/**
 * JobProgressEvent — payload published on `job:{jobId}:progress`.
 *
 * Shared contract between the worker pool (publisher) and progress
 * watchers (the WatchProgress gRPC stream).
 *
 * Invariants:
 *   - progress is in [0, 100] and non-decreasing for one attempt
 *   - errorMessage is set only when status === 'failed'
 *   - publishedAt is an ISO 8601 UTC string
 */
export interface JobProgressEvent {
  jobId: string;
  documentId: string;
  status: JobProgressStatus;
  progress: number;
  /** Pipeline stage that produced the event, null for lifecycle events */
  stage: string | null;
  message: string;
  errorMessage?: string;
  publishedAt: string;
}

export type JobProgressStatus =
  | 'pending'
  | 'processing'
  | 'completed'
  | 'failed'
  | 'canceled';

const STATUSES: ReadonlySet<string> = new Set<JobProgressStatus>([
  'pending',
  'processing',
  'completed',
  'failed',
  'canceled',
]);

const TERMINAL: ReadonlySet<string> = new Set<JobProgressStatus>([
  'completed',
  'failed',
  'canceled',
]);

/** Channel key, following the {domain}:{id}:{type} convention */
export function progressChannel(jobId: string): string {
  return `job:${jobId}:progress`;
}

export function isTerminalProgressStatus(status: JobProgressStatus): boolean {
  return TERMINAL.has(status);
}

export function isJobProgressEvent(value: unknown): value is JobProgressEvent {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate['jobId'] === 'string' &&
    typeof candidate['documentId'] === 'string' &&
    typeof candidate['status'] === 'string' &&
    STATUSES.has(candidate['status']) &&
    typeof candidate['progress'] === 'number' &&
    (candidate['stage'] === null || typeof candidate['stage'] === 'string') &&
    typeof candidate['message'] === 'string' &&
    typeof candidate['publishedAt'] === 'string'
  );
}
