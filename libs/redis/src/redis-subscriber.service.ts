import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import {
  EMPTY,
  Observable,
  Subject,
  filter,
  map,
  mergeMap,
  of,
  share,
  takeUntil,
} from 'rxjs';
import { REDIS_SUBSCRIBER_CLIENT } from './redis.constants';

/** The commands a connection in subscriber mode still accepts */
export type PubSubConnection = Pick<
  Redis,
  'on' | 'subscribe' | 'unsubscribe' | 'quit'
>;

interface ChannelMessage {
  channel: string;
  message: string;
}

/**
 * RedisSubscriberService — feeds `job:<jobId>:progress` channels to
 * WatchProgress streams.
 *
 * Streams watching the same job share one feed: SUBSCRIBE goes out with the
 * first of them and UNSUBSCRIBE with the last. The connection is dedicated
 * to this service since subscriber mode rules out every other command.
 */
@Injectable()
export class RedisSubscriberService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisSubscriberService.name);

  private readonly messages = new Subject<ChannelMessage>();
  private readonly shutdown = new Subject<void>();

  /** channel → feed, while at least one stream is watching it */
  private readonly feeds = new Map<string, Observable<string>>();

  constructor(
    @Inject(REDIS_SUBSCRIBER_CLIENT)
    private readonly client: PubSubConnection,
  ) {
    this.client.on('message', (channel: string, message: string) => {
      this.messages.next({ channel, message });
    });
  }

  /** Raw messages on `channel` until the caller unsubscribes. */
  subscribe(channel: string): Observable<string> {
    let feed = this.feeds.get(channel);
    if (!feed) {
      feed = this.openFeed(channel);
      this.feeds.set(channel, feed);
    }
    return feed;
  }

  /**
   * Messages on `channel` that parse as JSON and pass `guard`. Anything else
   * is logged and dropped; the stream stays open.
   */
  subscribeJson<T>(
    channel: string,
    guard: (value: unknown) => value is T,
  ): Observable<T> {
    return this.subscribe(channel).pipe(
      mergeMap((raw) => {
        const value = parseJson(raw);
        if (guard(value)) return of(value);

        this.logger.warn(
          `Dropped message on "${channel}": ${raw.slice(0, 120)}`,
        );
        return EMPTY;
      }),
    );
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing progress feeds');
    this.shutdown.next();
    this.shutdown.complete();
    this.messages.complete();
    this.feeds.clear();
    await this.client.quit();
  }

  private openFeed(channel: string): Observable<string> {
    const feed = new Observable<string>((observer) => {
      const forwarding = this.messages
        .pipe(
          filter((received) => received.channel === channel),
          map((received) => received.message),
        )
        .subscribe(observer);

      this.client.subscribe(channel).then(
        () => this.logger.debug(`Watching "${channel}"`),
        (err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          this.logger.error(`SUBSCRIBE "${channel}" failed: ${message}`);
          observer.error(new Error(`Redis subscribe failed: ${message}`));
        },
      );

      return () => {
        forwarding.unsubscribe();
        this.feeds.delete(channel);
        this.client.unsubscribe(channel).then(
          () => this.logger.debug(`Stopped watching "${channel}"`),
          (err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            this.logger.warn(`UNSUBSCRIBE "${channel}" failed: ${message}`);
          },
        );
      };
    });

    return feed.pipe(takeUntil(this.shutdown), share());
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
