import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_PUBLISHER_CLIENT } from './redis.constants';

/**
 * RedisPublisherService — owns the connection that sends PUBLISH.
 *
 * Progress events are fire-and-forget: a job with no WatchProgress stream
 * open has no subscriber, and a zero receiver count is not an error.
 */
@Injectable()
export class RedisPublisherService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisPublisherService.name);

  constructor(
    @Inject(REDIS_PUBLISHER_CLIENT)
    private readonly client: Redis,
  ) {}

  /**
   * Sends `payload` as JSON on `channel`, e.g. `job:<jobId>:progress`.
   *
   * @returns how many watchers were listening
   */
  async publish(channel: string, payload: object): Promise<number> {
    const receivers = await this.client.publish(
      channel,
      JSON.stringify(payload),
    );

    if (receivers === 0) {
      this.logger.verbose(`No watchers on "${channel}"`);
    } else {
      this.logger.debug(`"${channel}" delivered to ${receivers} watcher(s)`);
    }
    return receivers;
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Disconnecting progress publisher');
    await this.client.quit();
  }
}
