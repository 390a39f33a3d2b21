import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis, { RedisOptions } from 'ioredis';
import {
  QueueConsumer,
  QueueDelivery,
  WorkQueue,
} from './work-queue.interface';
import { QueueError } from './queue.errors';
import {
  StreamEntry,
  parseAutoClaimReply,
  parseReadGroupReply,
} from './stream-reply.parser';

export interface StreamQueueOptions {
  stream: string;
  group: string;
  /** Entries pending longer than this are reclaimed by the next dequeue */
  visibilityTimeoutMs: number;
}

/** Connection a consumer issues its blocking reads on */
export type StreamConsumerConnection = Pick<
  Redis,
  'xreadgroup' | 'xautoclaim' | 'xack' | 'quit'
>;

/** The part of the ioredis client the queue relies on */
export type StreamQueueClient = Pick<
  Redis,
  'xadd' | 'xgroup' | 'multi' | 'quit'
> & {
  duplicate(override?: Partial<RedisOptions>): StreamConsumerConnection;
};

const JOB_ID_FIELD = 'jobId';

/**
 * RedisStreamWorkQueue — WorkQueue on a Redis Stream with a consumer group.
 *
 * - enqueue: XADD
 * - dequeue: XAUTOCLAIM entries idle past the visibility timeout, otherwise
 *   a blocking XREADGROUP for new entries
 * - ack:     XACK + XDEL
 *
 * The shared client only issues non-blocking commands and keeps its bounded
 * maxRetriesPerRequest. Every consumer gets a duplicated connection for its
 * blocking reads, with retries unbounded so a BLOCK survives reconnects.
 */
export class RedisStreamWorkQueue implements WorkQueue, OnModuleDestroy {
  private readonly logger = new Logger(RedisStreamWorkQueue.name);
  private readonly consumers = new Set<RedisStreamConsumer>();
  private groupReady: Promise<void> | null = null;

  constructor(
    private readonly client: StreamQueueClient,
    private readonly options: StreamQueueOptions,
  ) {}

  async enqueue(jobId: string): Promise<void> {
    await this.ensureGroup();
    try {
      const entryId = await this.client.xadd(
        this.options.stream,
        '*',
        JOB_ID_FIELD,
        jobId,
        'enqueuedAt',
        new Date().toISOString(),
      );
      this.logger.debug(`Enqueued job ${jobId} as ${entryId ?? 'unknown'}`);
    } catch (error) {
      throw new QueueError('enqueue', error);
    }
  }

  async ack(ackHandle: string): Promise<void> {
    const { stream, group } = this.options;
    let replies: [Error | null, unknown][] | null;
    try {
      replies = await this.client
        .multi()
        .xack(stream, group, ackHandle)
        .xdel(stream, ackHandle)
        .exec();
    } catch (error) {
      throw new QueueError('ack', error);
    }

    const failed = replies?.find(([err]) => err !== null);
    if (failed) {
      throw new QueueError('ack', failed[0]);
    }
  }

  async createConsumer(name: string): Promise<QueueConsumer> {
    await this.ensureGroup();
    const consumer = new RedisStreamConsumer(
      name,
      this.client.duplicate({ maxRetriesPerRequest: null }),
      this.options,
      (closed) => this.consumers.delete(closed),
    );
    this.consumers.add(consumer);
    return consumer;
  }

  async onModuleDestroy(): Promise<void> {
    for (const consumer of [...this.consumers]) {
      await consumer.close();
    }
    this.logger.log('Closing Redis work queue connection');
    await this.client.quit();
  }

  /** Creates the consumer group once per process; BUSYGROUP means it exists. */
  private ensureGroup(): Promise<void> {
    if (!this.groupReady) {
      const { stream, group } = this.options;
      this.groupReady = this.client
        .xgroup('CREATE', stream, group, '0', 'MKSTREAM')
        .then(() => {
          this.logger.log(
            `Created consumer group "${group}" on stream "${stream}"`,
          );
        })
        .catch((error: unknown) => {
          const message =
            error instanceof Error ? error.message : String(error);
          if (message.includes('BUSYGROUP')) return;
          this.groupReady = null;
          throw new QueueError('ensureGroup', error);
        });
    }
    return this.groupReady;
  }
}

class RedisStreamConsumer implements QueueConsumer {
  private readonly logger = new Logger(RedisStreamConsumer.name);

  constructor(
    readonly name: string,
    private readonly connection: StreamConsumerConnection,
    private readonly options: StreamQueueOptions,
    private readonly onClose: (consumer: RedisStreamConsumer) => void,
  ) {}

  async dequeue(timeoutMs: number): Promise<QueueDelivery | null> {
    const reclaimed = await this.reclaimIdle();
    if (reclaimed) {
      return this.toDelivery(reclaimed, true);
    }

    const { stream, group } = this.options;
    let reply: unknown;
    try {
      reply = await this.connection.xreadgroup(
        'GROUP',
        group,
        this.name,
        'COUNT',
        1,
        'BLOCK',
        timeoutMs,
        'STREAMS',
        stream,
        '>',
      );
    } catch (error) {
      throw new QueueError('dequeue', error);
    }

    const [entry] = parseReadGroupReply(reply);
    return entry ? this.toDelivery(entry, false) : null;
  }

  async close(): Promise<void> {
    this.onClose(this);
    await this.connection.quit();
  }

  private async reclaimIdle(): Promise<StreamEntry | null> {
    const { stream, group, visibilityTimeoutMs } = this.options;
    try {
      const reply: unknown = await this.connection.xautoclaim(
        stream,
        group,
        this.name,
        visibilityTimeoutMs,
        '0-0',
        'COUNT',
        1,
      );
      const [entry] = parseAutoClaimReply(reply);
      return entry ?? null;
    } catch (error) {
      throw new QueueError('reclaim', error);
    }
  }

  private async toDelivery(
    entry: StreamEntry,
    redelivered: boolean,
  ): Promise<QueueDelivery | null> {
    const jobId = entry.fields[JOB_ID_FIELD];
    if (!jobId) {
      this.logger.warn(`Dropping stream entry ${entry.id} without a job id`);
      try {
        await this.connection.xack(
          this.options.stream,
          this.options.group,
          entry.id,
        );
      } catch (error) {
        throw new QueueError('ack', error);
      }
      return null;
    }

    if (redelivered) {
      this.logger.warn(
        `Reclaimed job ${jobId} (entry ${entry.id}) after visibility timeout`,
      );
    }
    return { jobId, ackHandle: entry.id, redelivered };
  }
}
