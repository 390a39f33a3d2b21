/**
 * @sheetwise/redis
 *
 * Redis infrastructure shared by the worker:
 *   - RedisModule.forRoot()     — import into any NestJS module
 *   - RedisPublisherService     — publish events to channels
 *   - RedisSubscriberService    — subscribe to channels as Observables
 *   - WORK_QUEUE                — WorkQueue backed by a Redis Stream
 */
export { RedisModule, queueClientOptions } from './redis.module';
export { RedisPublisherService } from './redis-publisher.service';
export { RedisSubscriberService } from './redis-subscriber.service';
export {
  REDIS_PUBLISHER_CLIENT,
  REDIS_SUBSCRIBER_CLIENT,
  REDIS_QUEUE_CLIENT,
} from './redis.constants';

export { WORK_QUEUE } from './work-queue/work-queue.interface';
export type {
  WorkQueue,
  QueueConsumer,
  QueueDelivery,
} from './work-queue/work-queue.interface';
export { RedisStreamWorkQueue } from './work-queue/redis-stream-work-queue';
export type {
  StreamQueueOptions,
  StreamQueueClient,
  StreamConsumerConnection,
} from './work-queue/redis-stream-work-queue';
export { QueueError } from './work-queue/queue.errors';
export {
  parseStreamEntries,
  parseReadGroupReply,
  parseAutoClaimReply,
} from './work-queue/stream-reply.parser';
export type { StreamEntry } from './work-queue/stream-reply.parser';

export {
  progressChannel,
  isJobProgressEvent,
  isTerminalProgressStatus,
} from './progress/job-progress-event';
export type {
  JobProgressEvent,
  JobProgressStatus,
} from './progress/job-progress-event';
export { JOB_EVENT_SINK } from './progress/job-event-sink';
export type { JobEventSink } from './progress/job-event-sink';
