import { Module } from '@nestjs/common';
import { PIPELINE_REGISTRY, createDefaultRegistry } from '@sheetwise/pipeline';
import { WORKER_SETTINGS, WorkerSettings } from '../config/worker-settings';
import { InferenceModule } from '../inference/inference.module';
import { StorageModule } from '../storage/storage.module';
import { PipelineExecutorService } from './pipeline-executor.service';

@Module({
  imports: [StorageModule, InferenceModule],
  providers: [
    {
      // Built once at startup; immutable afterwards
      provide: PIPELINE_REGISTRY,
      inject: [WORKER_SETTINGS],
      useFactory: (settings: WorkerSettings) =>
        createDefaultRegistry(settings.extraction),
    },
    PipelineExecutorService,
  ],
  exports: [PipelineExecutorService],
})
export class PipelineExecutorModule {}
