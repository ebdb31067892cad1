/**
 * Redis Pub/Sub Transport
 * @module services/cache-engine/transports/redis-pubsub-transport
 *
 * Pub/sub over Redis. A connection in subscriber mode cannot issue other
 * commands, so publishing goes through the regular client and
 * subscriptions through a duplicate.
 */

import type { Redis as RedisType } from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { LoggerLike, createModuleLogger } from '../../../logging/logger.js';
import { IPubSubTransport, PubSubMessageHandler, PubSubSubscription } from '../interfaces.js';

export interface RedisPublisherClient {
  publish(channel: string, message: string): Promise<number>;
}

export interface RedisSubscriberClient {
  subscribe(...channels: string[]): Promise<unknown>;
  unsubscribe(...channels: string[]): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): unknown;
  off(event: 'message', listener: (channel: string, message: string) => void): unknown;
  quit(): Promise<unknown>;
}

export interface RedisPubSubTransportDependencies {
  readonly publisher: RedisPublisherClient;
  readonly subscriber: RedisSubscriberClient;
  readonly logger?: LoggerLike;
}

export class RedisPubSubTransport implements IPubSubTransport {
  private readonly publisher: RedisPublisherClient;
  private readonly subscriber: RedisSubscriberClient;
  private readonly logger: LoggerLike;
  private readonly handlers = new Map<string, Map<string, PubSubMessageHandler>>();
  private readonly onMessage = (channel: string, message: string): void => {
    this.dispatch(channel, message);
  };
  private attached = false;

  constructor(deps: RedisPubSubTransportDependencies) {
    this.publisher = deps.publisher;
    this.subscriber = deps.subscriber;
    this.logger = deps.logger ?? createModuleLogger('redis-pubsub-transport');
  }

  async publish(channel: string, payload: string): Promise<void> {
    const receivers = await this.publisher.publish(channel, payload);
    this.logger.debug({ channel, receivers }, 'Published message');
  }

  async subscribe(channel: string, handler: PubSubMessageHandler): Promise<PubSubSubscription> {
    if (!this.attached) {
      this.subscriber.on('message', this.onMessage);
      this.attached = true;
    }

    let channelHandlers = this.handlers.get(channel);
    if (!channelHandlers) {
      channelHandlers = new Map();
      this.handlers.set(channel, channelHandlers);
      await this.subscriber.subscribe(channel);
      this.logger.info({ channel }, 'Subscribed to channel');
    }

    const subscription: PubSubSubscription = { id: uuidv4(), channel };
    channelHandlers.set(subscription.id, handler);
    return subscription;
  }

  async unsubscribe(subscription: PubSubSubscription): Promise<void> {
    const channelHandlers = this.handlers.get(subscription.channel);
    if (!channelHandlers?.delete(subscription.id)) {
      return;
    }

    if (channelHandlers.size === 0) {
      this.handlers.delete(subscription.channel);
      await this.subscriber.unsubscribe(subscription.channel);
      this.logger.info({ channel: subscription.channel }, 'Unsubscribed from channel');
    }
  }

  async close(): Promise<void> {
    const channels = Array.from(this.handlers.keys());
    this.handlers.clear();

    if (channels.length > 0) {
      await this.subscriber.unsubscribe(...channels);
    }
    if (this.attached) {
      this.subscriber.off('message', this.onMessage);
      this.attached = false;
    }
    await this.subscriber.quit();
  }

  private dispatch(channel: string, message: string): void {
    const channelHandlers = this.handlers.get(channel);
    if (!channelHandlers) {
      return;
    }

    for (const handler of channelHandlers.values()) {
      void Promise.resolve()
        .then(() => handler(message))
        .catch((error: unknown) => {
          this.logger.error({ err: error, channel }, 'Pub/sub handler failed');
        });
    }
  }
}

/**
 * Create a transport over an ioredis client: the client publishes and a
 * duplicate connection subscribes.
 */
export function createRedisPubSubTransport(client: RedisType, logger?: LoggerLike): RedisPubSubTransport {
  return new RedisPubSubTransport({
    publisher: client,
    subscriber: client.duplicate(),
    logger,
  });
}
