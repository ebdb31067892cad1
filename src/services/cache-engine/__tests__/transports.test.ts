/**
 * Pub/Sub Transport Unit Tests
 * @module services/cache-engine/__tests__/transports.test
 *
 * Tests for the in-process bus transport and the Redis transport over
 * fake publisher and subscriber connections.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MemoryPubSubBus, MemoryPubSubTransport, createMemoryPubSubTransport } from '../transports/memory-pubsub-transport.js';
import { RedisPubSubTransport } from '../transports/redis-pubsub-transport.js';
import {
  createFakeRedisPublisher,
  createFakeRedisSubscriber,
  createMockLogger,
  type FakeRedisPublisher,
  type FakeRedisSubscriber,
  type MockLogger,
} from './mocks.js';

const CHANNEL = 'test-cache:invalidation';

function flushDispatch(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('MemoryPubSubTransport', () => {
  let bus: MemoryPubSubBus;
  let mockLogger: MockLogger;
  let publisher: MemoryPubSubTransport;
  let listener: MemoryPubSubTransport;

  beforeEach(() => {
    mockLogger = createMockLogger();
    bus = new MemoryPubSubBus(mockLogger);
    publisher = createMemoryPubSubTransport(bus);
    listener = createMemoryPubSubTransport(bus);
  });

  it('should deliver to subscribers on the same bus before publish resolves', async () => {
    const handler = vi.fn();
    await listener.subscribe(CHANNEL, handler);

    await publisher.publish(CHANNEL, 'payload');

    expect(handler).toHaveBeenCalledWith('payload');
  });

  it('should not deliver to other channels', async () => {
    const handler = vi.fn();
    await listener.subscribe('other', handler);

    await publisher.publish(CHANNEL, 'payload');

    expect(handler).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', async () => {
    const handler = vi.fn();
    const subscription = await listener.subscribe(CHANNEL, handler);

    await listener.unsubscribe(subscription);
    await publisher.publish(CHANNEL, 'payload');

    expect(handler).not.toHaveBeenCalled();
    expect(bus.subscriberCount(CHANNEL)).toBe(0);
  });

  it('should remove only its own subscriptions on close', async () => {
    await listener.subscribe(CHANNEL, vi.fn());
    await publisher.subscribe(CHANNEL, vi.fn());

    await listener.close();

    expect(bus.subscriberCount(CHANNEL)).toBe(1);
  });

  it('should log a failing handler and still reach the others', async () => {
    const failure = new Error('handler failed');
    const healthy = vi.fn();
    const failingSubscription = await listener.subscribe(CHANNEL, () => {
      throw failure;
    });
    await publisher.subscribe(CHANNEL, healthy);

    await publisher.publish(CHANNEL, 'payload');

    expect(healthy).toHaveBeenCalledWith('payload');
    expect(mockLogger.error).toHaveBeenCalledWith(
      { err: failure, channel: CHANNEL, subscriptionId: failingSubscription.id },
      'Pub/sub handler failed'
    );
  });

  it('should report how many subscribers a delivery reached', async () => {
    await listener.subscribe(CHANNEL, vi.fn());
    await listener.subscribe(CHANNEL, vi.fn());

    expect(await bus.deliver(CHANNEL, 'payload')).toBe(2);
  });
});

describe('RedisPubSubTransport', () => {
  let publisher: FakeRedisPublisher;
  let subscriber: FakeRedisSubscriber;
  let mockLogger: MockLogger;
  let transport: RedisPubSubTransport;

  beforeEach(() => {
    publisher = createFakeRedisPublisher(3);
    subscriber = createFakeRedisSubscriber();
    mockLogger = createMockLogger();
    transport = new RedisPubSubTransport({ publisher, subscriber, logger: mockLogger });
  });

  it('should publish through the publisher connection', async () => {
    await transport.publish(CHANNEL, 'payload');

    expect(publisher.publish).toHaveBeenCalledWith(CHANNEL, 'payload');
    expect(mockLogger.debug).toHaveBeenCalledWith({ channel: CHANNEL, receivers: 3 }, 'Published message');
  });

  it('should subscribe to a channel once for several handlers', async () => {
    await transport.subscribe(CHANNEL, vi.fn());
    await transport.subscribe(CHANNEL, vi.fn());

    expect(subscriber.subscribe).toHaveBeenCalledTimes(1);
    expect(subscriber.subscribe).toHaveBeenCalledWith(CHANNEL);
    expect(subscriber.listenerCount()).toBe(1);
  });

  it('should dispatch messages to the channel handlers', async () => {
    const handler = vi.fn();
    const unrelated = vi.fn();
    await transport.subscribe(CHANNEL, handler);
    await transport.subscribe('other', unrelated);

    subscriber.emit(CHANNEL, 'payload');
    await flushDispatch();

    expect(handler).toHaveBeenCalledWith('payload');
    expect(unrelated).not.toHaveBeenCalled();
  });

  it('should log handler failures without affecting other handlers', async () => {
    const failure = new Error('handler failed');
    const healthy = vi.fn();
    await transport.subscribe(CHANNEL, async () => {
      throw failure;
    });
    await transport.subscribe(CHANNEL, healthy);

    subscriber.emit(CHANNEL, 'payload');
    await flushDispatch();

    expect(healthy).toHaveBeenCalledWith('payload');
    expect(mockLogger.error).toHaveBeenCalledWith({ err: failure, channel: CHANNEL }, 'Pub/sub handler failed');
  });

  it('should unsubscribe from the channel when its last handler leaves', async () => {
    const first = await transport.subscribe(CHANNEL, vi.fn());
    const second = await transport.subscribe(CHANNEL, vi.fn());

    await transport.unsubscribe(first);
    expect(subscriber.unsubscribe).not.toHaveBeenCalled();

    await transport.unsubscribe(second);
    expect(subscriber.unsubscribe).toHaveBeenCalledWith(CHANNEL);
  });

  it('should ignore unknown subscriptions', async () => {
    await transport.unsubscribe({ id: 'unknown', channel: CHANNEL });

    expect(subscriber.unsubscribe).not.toHaveBeenCalled();
  });

  it('should release every channel and the connection on close', async () => {
    await transport.subscribe(CHANNEL, vi.fn());
    await transport.subscribe('other', vi.fn());

    await transport.close();

    expect(subscriber.unsubscribe).toHaveBeenCalledWith(CHANNEL, 'other');
    expect(subscriber.listenerCount()).toBe(0);
    expect(subscriber.quit).toHaveBeenCalledTimes(1);
  });
});
