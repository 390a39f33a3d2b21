/** Infrastructure failure of the work queue (connection loss, command error). */
export class QueueError extends Error {
  constructor(operation: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Work queue operation "${operation}" failed: ${message}`, { cause });
    this.name = 'QueueError';
  }
}
