import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from './config.js';
import { InMemoryEventBackend } from './store/index.js';
import type { EventBackend } from './store/index.js';
import {
  createRedisClient,
  RedisEventBackend,
  createRedisEventPublisher,
  createLoggingEventPublisher,
} from './redis/index.js';
import type { EventPublisher } from './redis/index.js';
import { EventStore, ReplayManager, ReplaySessionRegistry } from '../application/index.js';
import type { Clock } from '../application/index.js';

export interface EventStorePluginOptions {
  config: AppConfig;
  /** Substitute backend; skips the Redis connection entirely. */
  backend?: EventBackend;
  publisher?: EventPublisher;
  clock?: Clock;
}

/**
 * Fastify plugin that owns the event backend and the services on top.
 *
 * - Connects Redis on start (unless the memory backend or a substitute
 *   backend is used), closes it on shutdown.
 * - Decorates `eventStore`, `replayManager`, `replaySessions`,
 *   `eventBackend` and `eventPublisher`.
 * - Runs `cleanupExpiredEvents` on an interval when configured.
 */
async function eventStorePlugin(
  fastify: FastifyInstance,
  opts: EventStorePluginOptions,
): Promise<void> {
  const { config } = opts;
  let backend = opts.backend;
  let publisher = opts.publisher;

  if (backend === undefined) {
    if (config.eventBackend === 'redis') {
      const redis = createRedisClient(config.redisUrl);
      redis.on('error', (err: Error) => {
        fastify.log.error({ err }, 'Redis connection error');
      });
      await redis.connect();
      fastify.log.info('Redis connected');

      backend = new RedisEventBackend(redis);
      publisher ??= createRedisEventPublisher(redis, fastify.log, config.keyPrefix);
    } else {
      backend = new InMemoryEventBackend();
      fastify.log.warn('Using in-memory event backend; events are lost on restart');
    }
  }

  publisher ??= createLoggingEventPublisher(fastify.log);
  const activePublisher = publisher;

  const eventStore = new EventStore({
    backend,
    log: fastify.log,
    keyPrefix: config.keyPrefix,
    maxEventsPerKey: config.maxEventsPerKey,
    eventTtlSeconds: config.eventTtlSeconds,
    onStored: config.publishEvents ? (event) => activePublisher.publish(event) : undefined,
  });

  const replayManager = new ReplayManager({
    eventStore,
    log: fastify.log,
    maxReplayEvents: config.maxReplayEvents,
    clock: opts.clock,
  });

  const replaySessions = new ReplaySessionRegistry(replayManager, fastify.log);

  fastify.decorate('eventBackend', backend);
  fastify.decorate('eventPublisher', activePublisher);
  fastify.decorate('eventStore', eventStore);
  fastify.decorate('replayManager', replayManager);
  fastify.decorate('replaySessions', replaySessions);

  let cleanupTimer: NodeJS.Timeout | null = null;
  if (config.cleanupIntervalSeconds > 0) {
    cleanupTimer = setInterval(() => {
      eventStore.cleanupExpiredEvents().catch((err: unknown) => {
        fastify.log.error({ err }, 'Scheduled cleanup failed');
      });
    }, config.cleanupIntervalSeconds * 1000);
    cleanupTimer.unref();
  }

  const ownedBackend = backend;
  fastify.addHook('onClose', async () => {
    if (cleanupTimer) clearInterval(cleanupTimer);
    await replaySessions.stopAll();
    await ownedBackend.close();
    fastify.log.info('Event backend closed');
  });
}

export default fp(eventStorePlugin, {
  name: 'event-store',
  fastify: '5.x',
});

/** Extend Fastify's type system so the services are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    eventBackend: EventBackend;
    eventPublisher: EventPublisher;
    eventStore: EventStore;
    replayManager: ReplayManager;
    replaySessions: ReplaySessionRegistry;
  }
}
