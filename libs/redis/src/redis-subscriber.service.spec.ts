import { firstValueFrom, lastValueFrom, toArray } from 'rxjs';
import {
  PubSubConnection,
  RedisSubscriberService,
} from './redis-subscriber.service';

describe('RedisSubscriberService', () => {
  let on: jest.Mock;
  let subscribe: jest.Mock;
  let unsubscribe: jest.Mock;
  let quit: jest.Mock;
  let service: RedisSubscriberService;

  function deliver(channel: string, message: string): void {
    const [, listener] = on.mock.calls[0];
    listener(channel, message);
  }

  beforeEach(() => {
    on = jest.fn();
    subscribe = jest.fn().mockResolvedValue(1);
    unsubscribe = jest.fn().mockResolvedValue(0);
    quit = jest.fn().mockResolvedValue('OK');

    const connection: PubSubConnection = { on, subscribe, unsubscribe, quit };
    service = new RedisSubscriberService(connection);
  });

  it('should send one SUBSCRIBE for streams watching the same job', () => {
    const first: string[] = [];
    const second: string[] = [];

    const channel = 'job:j1:progress';
    const a = service.subscribe(channel).subscribe((m) => first.push(m));
    const b = service.subscribe(channel).subscribe((m) => second.push(m));
    deliver('job:j1:progress', 'one');
    deliver('job:j2:progress', 'other job');

    expect(subscribe).toHaveBeenCalledTimes(1);
    expect(subscribe).toHaveBeenCalledWith('job:j1:progress');
    expect(first).toEqual(['one']);
    expect(second).toEqual(['one']);

    a.unsubscribe();
    expect(unsubscribe).not.toHaveBeenCalled();

    b.unsubscribe();
    expect(unsubscribe).toHaveBeenCalledWith('job:j1:progress');
  });

  it('should subscribe again once the last watcher has left', () => {
    service.subscribe('job:j1:progress').subscribe().unsubscribe();
    service.subscribe('job:j1:progress').subscribe();

    expect(subscribe).toHaveBeenCalledTimes(2);
    expect(unsubscribe).toHaveBeenCalledTimes(1);
  });

  it('should drop malformed JSON and payloads rejected by the guard', () => {
    const isCount = (value: unknown): value is { count: number } =>
      typeof value === 'object' &&
      value !== null &&
      'count' in value &&
      typeof value.count === 'number';
    const received: { count: number }[] = [];

    service
      .subscribeJson('job:j1:progress', isCount)
      .subscribe((value) => received.push(value));
    deliver('job:j1:progress', '{not json');
    deliver('job:j1:progress', '{"count":"3"}');
    deliver('job:j1:progress', '{"count":3}');

    expect(received).toEqual([{ count: 3 }]);
  });

  it('should fail the stream when SUBSCRIBE is rejected', async () => {
    subscribe.mockRejectedValue(new Error('Connection is closed.'));

    await expect(
      firstValueFrom(service.subscribe('job:j1:progress')),
    ).rejects.toThrow('Redis subscribe failed: Connection is closed.');
  });

  it('should complete open streams on shutdown', async () => {
    const collected = lastValueFrom(
      service.subscribe('job:j1:progress').pipe(toArray()),
    );
    deliver('job:j1:progress', 'last');

    await service.onModuleDestroy();

    await expect(collected).resolves.toEqual(['last']);
    expect(quit).toHaveBeenCalledTimes(1);
  });
});
