import { Module } from '@nestjs/common';
import { DatabaseModule } from '@sheetwise/database';
import { JobsModule } from '../jobs/jobs.module';
import {
  PipelineExecutorModule,
} from '../pipeline-executor/pipeline-executor.module';
import { ProgressModule } from '../progress/progress.module';
import { WorkerPoolService } from './worker-pool.service';

@Module({
  imports: [
    DatabaseModule.forFeature(),
    ProgressModule,
    JobsModule,
    PipelineExecutorModule,
  ],
  providers: [WorkerPoolService],
})
export class WorkerPoolModule {}
