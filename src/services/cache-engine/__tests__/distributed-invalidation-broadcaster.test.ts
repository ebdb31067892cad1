/**
 * Distributed Invalidation Broadcaster Unit Tests
 * @module services/cache-engine/__tests__/distributed-invalidation-broadcaster.test
 *
 * Tests for publishing, subscription lifecycle, inbound message handling
 * (self-echo, duplicates, malformed payloads) and a two-node fleet over
 * the in-process bus.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import {
  DistributedInvalidationBroadcaster,
  createDistributedInvalidationBroadcaster,
  generateInstanceId,
} from '../distributed-invalidation-broadcaster.js';
import { CacheEngineError } from '../errors.js';
import {
  emptyInvalidationResult,
  type ICacheInvalidator,
  type InvalidationReceivedEvent,
} from '../interfaces.js';
import { MemoryPubSubBus, MemoryPubSubTransport } from '../transports/memory-pubsub-transport.js';
import { FaultyStore, RecordingTransport, createMockLogger, type MockLogger } from './mocks.js';
import {
  createTestEnvelope,
  createTrackerHarness,
  seedEntry,
  trackingKeyFor,
  type TrackerHarness,
} from './fixtures.js';

const CHANNEL = 'test-cache:invalidation';

interface StubInvalidator extends ICacheInvalidator {
  trackKey: Mock<ICacheInvalidator['trackKey']>;
  getTrackedKeys: Mock<ICacheInvalidator['getTrackedKeys']>;
  invalidate: Mock<ICacheInvalidator['invalidate']>;
  invalidateByPattern: Mock<ICacheInvalidator['invalidateByPattern']>;
  invalidateWithRelated: Mock<ICacheInvalidator['invalidateWithRelated']>;
  invalidateBatch: Mock<ICacheInvalidator['invalidateBatch']>;
  invalidateByPatternBatch: Mock<ICacheInvalidator['invalidateByPatternBatch']>;
}

function createStubInvalidator(): StubInvalidator {
  return {
    trackKey: vi.fn<ICacheInvalidator['trackKey']>(async () => undefined),
    getTrackedKeys: vi.fn<ICacheInvalidator['getTrackedKeys']>(async () => []),
    invalidate: vi.fn<ICacheInvalidator['invalidate']>(async table => emptyInvalidationResult([table])),
    invalidateByPattern: vi.fn<ICacheInvalidator['invalidateByPattern']>(async pattern =>
      emptyInvalidationResult([pattern])
    ),
    invalidateWithRelated: vi.fn<ICacheInvalidator['invalidateWithRelated']>(async table =>
      emptyInvalidationResult([table])
    ),
    invalidateBatch: vi.fn<ICacheInvalidator['invalidateBatch']>(async tables => emptyInvalidationResult(tables)),
    invalidateByPatternBatch: vi.fn<ICacheInvalidator['invalidateByPatternBatch']>(async patterns =>
      emptyInvalidationResult(patterns)
    ),
  };
}

function publishedEnvelopes(transport: RecordingTransport): unknown[] {
  return transport.published.map(({ payload }) => JSON.parse(payload));
}

describe('DistributedInvalidationBroadcaster', () => {
  let harness: TrackerHarness;
  let transport: RecordingTransport;
  let mockLogger: MockLogger;
  let broadcaster: DistributedInvalidationBroadcaster;

  beforeEach(() => {
    harness = createTrackerHarness();
    transport = new RecordingTransport();
    mockLogger = createMockLogger();
    broadcaster = createDistributedInvalidationBroadcaster({
      localInvalidator: harness.tracker,
      transport,
      config: { namespace: 'test-cache' },
      instanceId: 'node-a',
      logger: mockLogger,
    });
  });

  afterEach(async () => {
    await broadcaster.dispose();
  });

  // =========================================================================
  // Identity
  // =========================================================================

  describe('identity', () => {
    it('should derive the channel from the namespace', () => {
      expect(broadcaster.channel).toBe(CHANNEL);
      expect(broadcaster.instanceId).toBe('node-a');
    });

    it('should generate host, pid and random suffix ids', () => {
      const id = generateInstanceId();

      expect(id).toMatch(new RegExp(`_${process.pid}_[0-9a-f]{8}$`));
      expect(generateInstanceId()).not.toBe(id);
    });

    it('should bind the instance id to its logger', () => {
      expect(mockLogger.child).toHaveBeenCalledWith({ instanceId: 'node-a' });
    });
  });

  // =========================================================================
  // Subscription Lifecycle
  // =========================================================================

  describe('listening', () => {
    it('should subscribe once under concurrent starts', async () => {
      await Promise.all([broadcaster.startListening(), broadcaster.startListening()]);

      expect(transport.subscribeCount).toBe(1);
      expect(broadcaster.isListening).toBe(true);
    });

    it('should unsubscribe on stop', async () => {
      await broadcaster.startListening();
      await broadcaster.stopListening();

      expect(broadcaster.isListening).toBe(false);
      expect(transport.handlers.size).toBe(0);
    });

    it('should treat stop without start as a no-op', async () => {
      await expect(broadcaster.stopListening()).resolves.toBeUndefined();
    });

    it('should refuse to listen after dispose', async () => {
      await broadcaster.startListening();
      await broadcaster.dispose();

      expect(transport.handlers.size).toBe(0);
      await expect(broadcaster.startListening()).rejects.toBeInstanceOf(CacheEngineError);
    });
  });

  // =========================================================================
  // Broadcasting
  // =========================================================================

  describe('broadcasting', () => {
    it('should invalidate locally and publish a table message', async () => {
      await seedEntry(harness, 'k1', ['users']);

      const result = await broadcaster.broadcastInvalidation('users');

      expect(result.invalidated).toBe(1);
      expect(await harness.store.exists('k1')).toBe(false);
      expect(transport.published[0].channel).toBe(CHANNEL);
      expect(publishedEnvelopes(transport)).toEqual([
        {
          sourceInstanceId: 'node-a',
          message: { type: 'Table', tableNames: ['users'], pattern: null, correlationId: expect.any(String) },
          timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/),
        },
      ]);
    });

    it('should publish pattern messages', async () => {
      await broadcaster.invalidateByPattern('test-cache_v1_GetUsers_*');

      expect(publishedEnvelopes(transport)).toEqual([
        expect.objectContaining({
          message: expect.objectContaining({ type: 'Pattern', tableNames: [], pattern: 'test-cache_v1_GetUsers_*' }),
        }),
      ]);
    });

    it('should publish batch messages', async () => {
      await broadcaster.invalidateBatch(['users', 'orders']);

      expect(publishedEnvelopes(transport)).toEqual([
        expect.objectContaining({
          message: expect.objectContaining({ type: 'Batch', tableNames: ['users', 'orders'], pattern: null }),
        }),
      ]);
    });

    it('should publish every visited table of a related invalidation as one batch', async () => {
      await broadcaster.invalidateWithRelated('orders', ['order_items', 'payments'], 3);

      expect(publishedEnvelopes(transport)).toEqual([
        expect.objectContaining({
          message: expect.objectContaining({ type: 'Batch', tableNames: ['orders', 'order_items', 'payments'] }),
        }),
      ]);
    });

    it('should publish one pattern message per distinct pattern', async () => {
      await broadcaster.invalidateByPatternBatch(['a_*', 'b_*', 'a_*']);

      expect(transport.published).toHaveLength(2);
    });

    it('should use a fresh correlation id per message', async () => {
      await broadcaster.invalidate('users');
      await broadcaster.invalidate('users');

      const [first, second] = transport.published.map(({ payload }) => payload);
      expect(JSON.parse(first).message.correlationId).not.toBe(JSON.parse(second).message.correlationId);
    });

    it('should track keys locally without publishing', async () => {
      await broadcaster.trackKey(['users'], 'k1');

      expect(await broadcaster.getTrackedKeys('users')).toEqual(['k1']);
      expect(transport.published).toHaveLength(0);
    });

    it('should report publish failures under silent fallback', async () => {
      const failure = new Error('broker down');
      const onError = vi.fn();
      transport.publishError = failure;
      broadcaster = new DistributedInvalidationBroadcaster({
        localInvalidator: harness.tracker,
        transport,
        instanceId: 'node-a',
        onError,
        logger: mockLogger,
      });

      const result = await broadcaster.invalidate('users');

      expect(result.targets).toEqual(['users']);
      expect(onError).toHaveBeenCalledWith(failure, { operation: 'publish', targets: ['users'] });
      expect(mockLogger.error).toHaveBeenCalledWith(
        { err: failure, type: 'Table', tableNames: ['users'], pattern: null },
        'Failed to publish invalidation'
      );
    });

    it('should rethrow publish failures without silent fallback', async () => {
      transport.publishError = new Error('broker down');
      broadcaster = new DistributedInvalidationBroadcaster({
        localInvalidator: harness.tracker,
        transport,
        config: { silentFallback: false },
        logger: mockLogger,
      });

      await expect(broadcaster.invalidate('users')).rejects.toThrow('broker down');
    });
  });

  // =========================================================================
  // Inbound Messages
  // =========================================================================

  describe('receiving', () => {
    let stub: StubInvalidator;

    beforeEach(async () => {
      stub = createStubInvalidator();
      broadcaster = new DistributedInvalidationBroadcaster({
        localInvalidator: stub,
        transport,
        instanceId: 'node-a',
        config: { recentMessageCapacity: 2 },
        logger: mockLogger,
      });
      await broadcaster.startListening();
    });

    it('should apply a peer table message locally and notify listeners', async () => {
      const events: InvalidationReceivedEvent[] = [];
      broadcaster.onInvalidationReceived(event => {
        events.push(event);
      });
      const envelope = createTestEnvelope({ tableNames: ['users', 'orders'] });

      await transport.deliver(JSON.stringify(envelope));

      expect(stub.invalidate).toHaveBeenCalledTimes(2);
      expect(stub.invalidate).toHaveBeenCalledWith('users');
      expect(stub.invalidate).toHaveBeenCalledWith('orders');
      expect(events).toHaveLength(1);
      expect(events[0].sourceInstanceId).toBe(envelope.sourceInstanceId);
      expect(events[0].message).toEqual(envelope.message);
      expect(events[0].receivedAt).toBeInstanceOf(Date);
    });

    it('should never re-publish applied messages', async () => {
      await transport.deliver(JSON.stringify(createTestEnvelope()));

      expect(transport.published).toHaveLength(0);
    });

    it('should apply pattern and batch messages', async () => {
      await transport.deliver(JSON.stringify(createTestEnvelope({ type: 'Pattern', tableNames: [], pattern: 'x_*' })));
      await transport.deliver(JSON.stringify(createTestEnvelope({ type: 'Batch', tableNames: ['a', 'b'] })));

      expect(stub.invalidateByPattern).toHaveBeenCalledWith('x_*');
      expect(stub.invalidateBatch).toHaveBeenCalledWith(['a', 'b']);
    });

    it('should ignore its own messages', async () => {
      const listener = vi.fn();
      broadcaster.onInvalidationReceived(listener);

      await transport.deliver(JSON.stringify(createTestEnvelope({ sourceInstanceId: 'node-a' })));

      expect(stub.invalidate).not.toHaveBeenCalled();
      expect(listener).not.toHaveBeenCalled();
    });

    it('should apply a duplicated delivery once', async () => {
      const listener = vi.fn();
      broadcaster.onInvalidationReceived(listener);
      const payload = JSON.stringify(createTestEnvelope({ correlationId: 'corr-1' }));

      await transport.deliver(payload);
      await transport.deliver(payload);

      expect(stub.invalidate).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(mockLogger.debug).toHaveBeenCalledWith({ correlationId: 'corr-1' }, 'Skipping duplicate invalidation');
    });

    it('should forget the oldest correlation ids beyond capacity', async () => {
      const first = JSON.stringify(createTestEnvelope({ correlationId: 'corr-1' }));

      await transport.deliver(first);
      await transport.deliver(JSON.stringify(createTestEnvelope({ correlationId: 'corr-2' })));
      await transport.deliver(JSON.stringify(createTestEnvelope({ correlationId: 'corr-3' })));
      await transport.deliver(first);

      expect(stub.invalidate).toHaveBeenCalledTimes(4);
    });

    it('should drop payloads that are not JSON', async () => {
      await expect(transport.deliver('not json')).resolves.toBeUndefined();

      expect(mockLogger.warn).toHaveBeenCalledWith(
        { err: expect.any(CacheEngineError) },
        'Dropping undecodable invalidation message'
      );
    });

    it('should drop envelopes of the wrong shape', async () => {
      await transport.deliver(JSON.stringify({ sourceInstanceId: 'peer', message: { type: 'Everything' } }));

      expect(stub.invalidate).not.toHaveBeenCalled();
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { err: expect.any(CacheEngineError) },
        'Dropping malformed invalidation message'
      );
    });

    it('should log a failed apply and accept a retry of the same message', async () => {
      const failure = new Error('store down');
      stub.invalidate.mockRejectedValueOnce(failure);
      const payload = JSON.stringify(createTestEnvelope({ correlationId: 'corr-9' }));

      await transport.deliver(payload);
      await transport.deliver(payload);

      expect(stub.invalidate).toHaveBeenCalledTimes(2);
      expect(mockLogger.error).toHaveBeenCalledWith(
        { err: failure, sourceInstanceId: 'peer-host_1234_abcd1234', correlationId: 'corr-9' },
        'Failed to apply remote invalidation'
      );
    });

    it('should retry a message whose local invalidation failed under silent fallback', async () => {
      const store = new FaultyStore();
      const tracking = createTrackerHarness({ store });
      await seedEntry(tracking, 'k1', ['users']);
      store.failOn('get', key => key === trackingKeyFor('users'));
      const listener = vi.fn();
      await broadcaster.dispose();
      broadcaster = new DistributedInvalidationBroadcaster({
        localInvalidator: tracking.tracker,
        transport,
        instanceId: 'node-a',
        logger: mockLogger,
      });
      broadcaster.onInvalidationReceived(listener);
      await broadcaster.startListening();
      const payload = JSON.stringify(createTestEnvelope({ correlationId: 'corr-7' }));

      await transport.deliver(payload);

      expect(listener).not.toHaveBeenCalled();
      expect(mockLogger.error).toHaveBeenCalledWith(
        { err: expect.any(CacheEngineError), sourceInstanceId: 'peer-host_1234_abcd1234', correlationId: 'corr-7' },
        'Failed to apply remote invalidation'
      );

      store.heal();
      await transport.deliver(payload);

      expect(await store.inner.get('k1')).toEqual({ found: false });
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should log a throwing listener and still notify the rest', async () => {
      const failure = new Error('listener failed');
      const healthy = vi.fn();
      broadcaster.onInvalidationReceived(() => {
        throw failure;
      });
      broadcaster.onInvalidationReceived(healthy);

      await transport.deliver(JSON.stringify(createTestEnvelope({ correlationId: 'corr-5' })));

      expect(healthy).toHaveBeenCalledTimes(1);
      expect(mockLogger.error).toHaveBeenCalledWith(
        { err: failure, correlationId: 'corr-5' },
        'Invalidation listener threw'
      );
    });

    it('should stop notifying an unsubscribed listener', async () => {
      const listener = vi.fn();
      const unsubscribe = broadcaster.onInvalidationReceived(listener);

      unsubscribe();
      await transport.deliver(JSON.stringify(createTestEnvelope()));

      expect(listener).not.toHaveBeenCalled();
    });
  });

  // =========================================================================
  // Fleet
  // =========================================================================

  describe('fleet over the in-process bus', () => {
    let nodeB: TrackerHarness;
    let transportB: MemoryPubSubTransport;
    let broadcasterA: DistributedInvalidationBroadcaster;
    let broadcasterB: DistributedInvalidationBroadcaster;

    beforeEach(async () => {
      const bus = new MemoryPubSubBus(mockLogger);
      nodeB = createTrackerHarness();
      transportB = new MemoryPubSubTransport(bus);
      broadcasterA = new DistributedInvalidationBroadcaster({
        localInvalidator: harness.tracker,
        transport: new MemoryPubSubTransport(bus),
        instanceId: 'node-a',
        logger: mockLogger,
      });
      broadcasterB = new DistributedInvalidationBroadcaster({
        localInvalidator: nodeB.tracker,
        transport: transportB,
        instanceId: 'node-b',
        logger: mockLogger,
      });
      await broadcasterA.startListening();
      await broadcasterB.startListening();
    });

    afterEach(async () => {
      await broadcasterA.dispose();
      await broadcasterB.dispose();
    });

    it('should invalidate the peer cache without echoing back', async () => {
      await seedEntry(harness, 'k1', ['users']);
      await seedEntry(nodeB, 'k1', ['users']);
      const republish = vi.spyOn(transportB, 'publish');

      await broadcasterA.invalidate('users');

      expect(await harness.store.exists('k1')).toBe(false);
      expect(await nodeB.store.exists('k1')).toBe(false);
      expect(republish).not.toHaveBeenCalled();
    });

    it('should converge on a batch issued by either node', async () => {
      await seedEntry(harness, 'U_1', ['Users']);
      await seedEntry(harness, 'U_2', ['Orders']);

      await broadcasterB.invalidateBatch(['Users', 'Orders']);

      expect(await harness.store.exists('U_1')).toBe(false);
      expect(await harness.store.exists('U_2')).toBe(false);
      expect(await harness.tracker.getTrackedKeys('Users')).toEqual([]);
    });
  });
});
