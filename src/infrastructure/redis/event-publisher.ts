import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import type { SimulationEvent } from '../../domain/index.js';
import { serializeEvent } from '../../application/event-schema.js';

/**
 * Pushes an event to live listeners. Never rejects.
 */
export interface EventPublisher {
  publish(event: SimulationEvent, channelSuffix?: string): Promise<void>;
}

/** Channel for a simulation's live events, e.g. `simulation_events:pubsub:sim-1`. */
export function eventChannel(keyPrefix: string, simulationId: string, suffix?: string): string {
  const base = `${keyPrefix}:pubsub:${simulationId}`;
  return suffix ? `${base}:${suffix}` : base;
}

/**
 * Publishes events to the simulation's Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never reach the caller,
 * so a broken channel cannot fail a store or a replay.
 */
export function createRedisEventPublisher(
  redis: Redis,
  log: BaseLogger,
  keyPrefix: string,
): EventPublisher {
  return {
    async publish(event, channelSuffix) {
      const channel = eventChannel(keyPrefix, event.simulation_id, channelSuffix);
      try {
        const receivers = await redis.publish(channel, serializeEvent(event));
        log.debug({ channel, event_id: event.event_id, receivers }, 'Published simulation event');
      } catch (err: unknown) {
        log.warn({ err, channel, event_id: event.event_id }, 'Failed to publish simulation event');
      }
    },
  };
}

/**
 * Publisher used with the in-memory backend: there is no broker, so
 * events are only traced at debug level.
 */
export function createLoggingEventPublisher(log: BaseLogger): EventPublisher {
  return {
    async publish(event, channelSuffix) {
      log.debug(
        { event_id: event.event_id, simulation_id: event.simulation_id, channel_suffix: channelSuffix },
        'Simulation event (no broker configured)',
      );
    },
  };
}
