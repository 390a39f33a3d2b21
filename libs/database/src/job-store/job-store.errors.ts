/**
 * Raised when the relational store fails for infrastructure reasons
 * (connection loss, deadlock, constraint other than the ones the store
 * translates into domain outcomes).
 */
export class StorageError extends Error {
  constructor(operation: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Job store operation "${operation}" failed: ${message}`, { cause });
    this.name = 'StorageError';
  }
}
