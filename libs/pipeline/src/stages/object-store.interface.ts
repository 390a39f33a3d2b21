/** Injection token for the ObjectStore implementation */
export const OBJECT_STORE = 'OBJECT_STORE';

/** Read access to the raw bytes of uploaded documents. */
export interface ObjectStore {
  get(storageRef: string): Promise<Buffer>;
}

export class StorageObjectNotFoundError extends Error {
  constructor(readonly storageRef: string) {
    super(`Object "${storageRef}" not found`);
    this.name = 'StorageObjectNotFoundError';
  }
}

/** Connection or read failure; safe to retry. */
export class ObjectStoreError extends Error {
  constructor(storageRef: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read object "${storageRef}": ${message}`, { cause });
    this.name = 'ObjectStoreError';
  }
}
