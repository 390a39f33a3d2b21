import { JobProgressEvent } from './job-progress-event';

/** Injection token for the JobEventSink implementation */
export const JOB_EVENT_SINK = 'JOB_EVENT_SINK';

/**
 * Destination for job progress events. Publishing is best-effort: the job
 * store is the source of truth, so implementations must not throw.
 */
export interface JobEventSink {
  publish(event: JobProgressEvent): Promise<void>;
}
