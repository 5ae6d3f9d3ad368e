import { describe, it, expect, vi, afterEach } from 'vitest';
import type { Redis } from 'ioredis';
import { createRedisClient } from '../../src/infrastructure/redis/client.js';
import { RedisEventBackend } from '../../src/infrastructure/redis/redis-event-backend.js';
import { EventStore } from '../../src/application/event-store.js';
import { makeEvent, fakeLogger } from '../helpers.js';

// Nothing listens on port 1; connections are refused locally.
const UNREACHABLE_URL = 'redis://127.0.0.1:1';

let redis: Redis | null = null;

afterEach(() => {
  redis?.disconnect();
  redis = null;
});

describe('createRedisClient', () => {
  it('should bound retries instead of queueing commands forever', () => {
    const client = createRedisClient(UNREACHABLE_URL);
    redis = client;

    expect(client.options.maxRetriesPerRequest).toBe(2);
    expect(client.options.commandTimeout).toBe(5_000);
    expect(client.options.lazyConnect).toBe(true);
  });

  it('should let the event store degrade while Redis is unreachable', async () => {
    const client = createRedisClient(UNREACHABLE_URL);
    redis = client;
    client.on('error', vi.fn());
    const store = new EventStore({ backend: new RedisEventBackend(client), log: fakeLogger() });

    expect(await store.storeEvent(makeEvent({ simulation_id: 'sim-down' }))).toBe(false);
    expect(await store.getEvents('sim-down')).toEqual([]);
    expect(store.getStats()).toMatchObject({ store_failures: 1, read_failures: 1 });
  }, 15_000);
});
