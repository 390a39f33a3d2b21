import { Injectable, Logger } from '@nestjs/common';
import {
  JobEventSink,
  JobProgressEvent,
  RedisPublisherService,
  progressChannel,
} from '@sheetwise/redis';

/**
 * Publishes job progress on `job:{jobId}:progress`.
 *
 * Non-fatal: the job store is the source of truth, PubSub only feeds live
 * watchers, so a failed publish is logged and dropped.
 */
@Injectable()
export class RedisJobEventSink implements JobEventSink {
  private readonly logger = new Logger(RedisJobEventSink.name);

  constructor(private readonly publisher: RedisPublisherService) {}

  async publish(event: JobProgressEvent): Promise<void> {
    const channel = progressChannel(event.jobId);
    try {
      await this.publisher.publish(channel, event);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Failed to publish ${event.status} event to channel "${channel}": ` +
          message,
      );
    }
  }
}
