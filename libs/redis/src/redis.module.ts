import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';
import {
  REDIS_PUBLISHER_CLIENT,
  REDIS_QUEUE_CLIENT,
  REDIS_SUBSCRIBER_CLIENT,
} from './redis.constants';
import { RedisPublisherService } from './redis-publisher.service';
import { RedisSubscriberService } from './redis-subscriber.service';
import { WORK_QUEUE } from './work-queue/work-queue.interface';
import { RedisStreamWorkQueue } from './work-queue/redis-stream-work-queue';

/** Commands on shared connections give up after this many reconnects */
const MAX_RETRIES_PER_REQUEST = 3;

function connectionOptions(configService: ConfigService): RedisOptions {
  return {
    host: configService.get<string>('REDIS_HOST', 'localhost'),
    port: configService.get<number>('REDIS_PORT', 6379),
    // Exponential back-off capped at 10 s
    retryStrategy: (times: number) => Math.min(times * 100, 10_000),
    enableReadyCheck: true,
    lazyConnect: false,
  };
}

/**
 * Options for the shared queue connection. XADD, XACK and XGROUP must fail
 * while Redis is down so that createJob and the watchdog can carry on; only
 * the consumers' duplicated connections wait indefinitely.
 */
export function queueClientOptions(configService: ConfigService): RedisOptions {
  return {
    ...connectionOptions(configService),
    maxRetriesPerRequest: MAX_RETRIES_PER_REQUEST,
  };
}

/**
 * RedisModule — async dynamic module providing PubSub and the work queue.
 * Registered globally so the whole app shares one set of connections.
 *
 * Connections:
 *   - publisher:  PUBLISH only
 *   - subscriber: locked in subscriber mode once subscribe() is called
 *   - queue:      XADD / XACK / XGROUP, bounded retries per command;
 *                 consumers duplicate it for blocking reads
 */
@Module({})
export class RedisModule {
  static forRoot(): DynamicModule {
    const publisherProvider: Provider = {
      provide: REDIS_PUBLISHER_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis =>
        new Redis({
          ...connectionOptions(configService),
          maxRetriesPerRequest: MAX_RETRIES_PER_REQUEST,
        }),
    };

    const subscriberProvider: Provider = {
      provide: REDIS_SUBSCRIBER_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis =>
        // SUBSCRIBE is replayed on reconnect, so it may wait for Redis
        new Redis({
          ...connectionOptions(configService),
          maxRetriesPerRequest: null,
        }),
    };

    const queueClientProvider: Provider = {
      provide: REDIS_QUEUE_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis =>
        new Redis(queueClientOptions(configService)),
    };

    const workQueueProvider: Provider = {
      provide: WORK_QUEUE,
      inject: [REDIS_QUEUE_CLIENT, ConfigService],
      useFactory: (
        client: Redis,
        configService: ConfigService,
      ): RedisStreamWorkQueue =>
        new RedisStreamWorkQueue(client, {
          stream: configService.get<string>('QUEUE_STREAM', 'sheetwise:jobs'),
          group: configService.get<string>('QUEUE_GROUP', 'sheetwise-workers'),
          visibilityTimeoutMs: Number(
            configService.get<number>('QUEUE_VISIBILITY_TIMEOUT_MS', 120_000),
          ),
        }),
    };

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers: [
        publisherProvider,
        subscriberProvider,
        queueClientProvider,
        workQueueProvider,
        RedisPublisherService,
        RedisSubscriberService,
      ],
      exports: [RedisPublisherService, RedisSubscriberService, WORK_QUEUE],
      global: true,
    };
  }
}
