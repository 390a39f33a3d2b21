/** Injection token for the WorkQueue implementation */
export const WORK_QUEUE = 'WORK_QUEUE';

/**
 * One delivery of a job id. Hidden from other consumers until acked or
 * the visibility timeout elapses.
 */
export interface QueueDelivery {
  jobId: string;
  /** Opaque handle passed back to ack() */
  ackHandle: string;
  /** True when the entry was reclaimed from a consumer that never acked it */
  redelivered: boolean;
}

/**
 * A consumer owns its own connection; dequeue() may block for up to
 * timeoutMs and must not be shared between concurrent loops.
 */
export interface QueueConsumer {
  readonly name: string;
  dequeue(timeoutMs: number): Promise<QueueDelivery | null>;
  close(): Promise<void>;
}

/**
 * WorkQueue — durable, at-least-once queue of job ids.
 */
export interface WorkQueue {
  enqueue(jobId: string): Promise<void>;
  ack(ackHandle: string): Promise<void>;
  createConsumer(name: string): Promise<QueueConsumer>;
}
