/**
 * Memory Pub/Sub Transport
 * @module services/cache-engine/transports/memory-pubsub-transport
 *
 * In-process pub/sub. Transports attached to the same bus see each
 * other's messages, which lets several engine instances in one process
 * (or one test) behave like a fleet.
 */

import { v4 as uuidv4 } from 'uuid';
import { LoggerLike, createModuleLogger } from '../../../logging/logger.js';
import { IPubSubTransport, PubSubMessageHandler, PubSubSubscription } from '../interfaces.js';

interface BusSubscriber {
  readonly subscription: PubSubSubscription;
  readonly handler: PubSubMessageHandler;
}

/**
 * Shared channel registry
 */
export class MemoryPubSubBus {
  private readonly channels = new Map<string, Map<string, BusSubscriber>>();

  constructor(private readonly logger: LoggerLike = createModuleLogger('memory-pubsub-bus')) {}

  add(subscriber: BusSubscriber): void {
    const { channel, id } = subscriber.subscription;
    let subscribers = this.channels.get(channel);
    if (!subscribers) {
      subscribers = new Map();
      this.channels.set(channel, subscribers);
    }
    subscribers.set(id, subscriber);
  }

  delete(subscription: PubSubSubscription): void {
    const subscribers = this.channels.get(subscription.channel);
    if (!subscribers) {
      return;
    }
    subscribers.delete(subscription.id);
    if (subscribers.size === 0) {
      this.channels.delete(subscription.channel);
    }
  }

  /**
   * Deliver to every subscriber and wait for all handlers.
   * Returns the number of subscribers reached.
   */
  async deliver(channel: string, payload: string): Promise<number> {
    const subscribers = Array.from(this.channels.get(channel)?.values() ?? []);

    await Promise.all(
      subscribers.map(async ({ subscription, handler }) => {
        try {
          await handler(payload);
        } catch (error) {
          this.logger.error({ err: error, channel, subscriptionId: subscription.id }, 'Pub/sub handler failed');
        }
      })
    );

    return subscribers.length;
  }

  subscriberCount(channel: string): number {
    return this.channels.get(channel)?.size ?? 0;
  }
}

export class MemoryPubSubTransport implements IPubSubTransport {
  private readonly owned = new Set<PubSubSubscription>();

  constructor(private readonly bus: MemoryPubSubBus) {}

  async publish(channel: string, payload: string): Promise<void> {
    await this.bus.deliver(channel, payload);
  }

  async subscribe(channel: string, handler: PubSubMessageHandler): Promise<PubSubSubscription> {
    const subscription: PubSubSubscription = { id: uuidv4(), channel };
    this.bus.add({ subscription, handler });
    this.owned.add(subscription);
    return subscription;
  }

  async unsubscribe(subscription: PubSubSubscription): Promise<void> {
    this.bus.delete(subscription);
    this.owned.delete(subscription);
  }

  async close(): Promise<void> {
    for (const subscription of this.owned) {
      this.bus.delete(subscription);
    }
    this.owned.clear();
  }
}

export function createMemoryPubSubTransport(bus: MemoryPubSubBus = new MemoryPubSubBus()): MemoryPubSubTransport {
  return new MemoryPubSubTransport(bus);
}
