import { Module } from '@nestjs/common';
import { DatabaseModule } from '@sheetwise/database';
import { ProgressModule } from '../progress/progress.module';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';

/**
 * JobsModule — the orchestrator and its gRPC surface.
 *
 * WORK_QUEUE and RedisSubscriberService come from the global RedisModule.
 */
@Module({
  imports: [DatabaseModule.forFeature(), ProgressModule],
  controllers: [JobsController],
  providers: [JobsService],
  exports: [JobsService],
})
export class JobsModule {}
