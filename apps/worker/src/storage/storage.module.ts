import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { OBJECT_STORE } from '@sheetwise/pipeline';
import { MinioObjectStore } from './minio-object-store';

/**
 * StorageModule — provides OBJECT_STORE backed by MinIO.
 */
@Module({
  imports: [ConfigModule],
  providers: [{ provide: OBJECT_STORE, useClass: MinioObjectStore }],
  exports: [OBJECT_STORE],
})
export class StorageModule {}
