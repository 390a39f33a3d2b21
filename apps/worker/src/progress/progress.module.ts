import { Module } from '@nestjs/common';
import { JOB_EVENT_SINK } from '@sheetwise/redis';
import { RedisJobEventSink } from './redis-job-event-sink';

/**
 * ProgressModule — JOB_EVENT_SINK for the orchestrator, worker pool and
 * watchdog. RedisPublisherService comes from the global RedisModule.
 */
@Module({
  providers: [{ provide: JOB_EVENT_SINK, useClass: RedisJobEventSink }],
  exports: [JOB_EVENT_SINK],
})
export class ProgressModule {}
