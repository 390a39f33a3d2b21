import {
  ObjectStore,
  ObjectStoreError,
  StorageObjectNotFoundError,
} from '@sheetwise/pipeline';

export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Buffer>();
  private readonly faults: Error[] = [];

  readonly reads: string[] = [];

  put(storageRef: string, bytes: Buffer): void {
    this.objects.set(storageRef, bytes);
  }

  /** Queues an IO failure for the next get() */
  failNextRead(message = 'connection reset'): void {
    this.faults.push(new Error(message));
  }

  async get(storageRef: string): Promise<Buffer> {
    this.reads.push(storageRef);

    const fault = this.faults.shift();
    if (fault) {
      throw new ObjectStoreError(storageRef, fault);
    }

    const bytes = this.objects.get(storageRef);
    if (!bytes) {
      throw new StorageObjectNotFoundError(storageRef);
    }
    return bytes;
  }
}
