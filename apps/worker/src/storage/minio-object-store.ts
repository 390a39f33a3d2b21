import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { Readable } from 'stream';
import {
  ObjectStore,
  ObjectStoreError,
  StorageObjectNotFoundError,
} from '@sheetwise/pipeline';

/** S3 error codes meaning the key (or its bucket) does not exist */
const MISSING_OBJECT_CODES: ReadonlySet<string> = new Set([
  'NoSuchKey',
  'NotFound',
  'NoSuchBucket',
]);

/**
 * MinioObjectStore — read side of the document object store.
 *
 * Uploads happen elsewhere; the worker only fetches the bytes referenced by
 * Document.storageRef. A missing key is reported as
 * StorageObjectNotFoundError, anything else as a retryable ObjectStoreError.
 */
@Injectable()
export class MinioObjectStore implements ObjectStore, OnModuleInit {
  private readonly logger = new Logger(MinioObjectStore.name);
  private readonly client: Minio.Client;
  private readonly bucket: string;
  private readonly endpoint: string;
  private readonly port: number;

  constructor(private readonly configService: ConfigService) {
    const config = this.configService;
    this.endpoint = config.get<string>('MINIO_ENDPOINT', 'localhost');
    this.port = Number(config.get<number>('MINIO_PORT', 9000));
    this.bucket = config.get<string>('MINIO_BUCKET', 'sheetwise-documents');

    this.client = new Minio.Client({
      endPoint: this.endpoint,
      port: this.port,
      useSSL: config.get<string>('MINIO_USE_SSL', 'false') === 'true',
      accessKey: config.get<string>('MINIO_ACCESS_KEY', 'minioadmin'),
      secretKey: config.get<string>('MINIO_SECRET_KEY', 'minioadmin'),
    });
  }

  async onModuleInit(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        this.logger.warn(
          `Bucket "${this.bucket}" does not exist; every read will fail`,
        );
        return;
      }
      this.logger.log(
        `Object store ready — bucket: "${this.bucket}" ` +
          `@ ${this.endpoint}:${this.port}`,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // Reads retry on their own; startup must not depend on MinIO being up
      this.logger.warn(`Could not check bucket "${this.bucket}": ${message}`);
    }
  }

  async get(storageRef: string): Promise<Buffer> {
    try {
      const stream = await this.client.getObject(this.bucket, storageRef);
      const bytes = await readStream(stream);
      this.logger.debug(`Read "${storageRef}" (${bytes.length} bytes)`);
      return bytes;
    } catch (error) {
      if (isMissingObjectError(error)) {
        throw new StorageObjectNotFoundError(storageRef);
      }
      throw new ObjectStoreError(storageRef, error);
    }
  }
}

export function isMissingObjectError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return (
    typeof error.code === 'string' && MISSING_OBJECT_CODES.has(error.code)
  );
}

export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    const data: unknown = chunk;
    chunks.push(Buffer.isBuffer(data) ? data : Buffer.from(String(data)));
  }
  return Buffer.concat(chunks);
}
