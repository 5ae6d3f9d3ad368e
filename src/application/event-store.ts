import type { BaseLogger } from 'pino';
import type { SimulationEvent } from '../domain/index.js';
import type { EventBackend } from '../infrastructure/store/event-backend.js';
import { parseStoredEvent, serializeEvent } from './event-schema.js';

export const DEFAULT_KEY_PREFIX = 'simulation_events';
export const DEFAULT_MAX_EVENTS_PER_KEY = 1000;
export const DEFAULT_EVENT_TTL_SECONDS = 86_400 * 30;
export const DEFAULT_PAGE_LIMIT = 100;

export interface EventStoreOptions {
  backend: EventBackend;
  log: BaseLogger;
  keyPrefix?: string;
  /** Soft cap applied when a caller asks for "all" events of a stream. */
  maxEventsPerKey?: number;
  eventTtlSeconds?: number;
  /** Runs after each successful write. Failures are logged, not surfaced. */
  onStored?: (event: SimulationEvent) => Promise<void>;
}

export interface EventStoreStats {
  events_stored: number;
  events_retrieved: number;
  malformed_records: number;
  store_failures: number;
  read_failures: number;
  keys_cleaned: number;
}

/**
 * Append-only, per-simulation event log.
 *
 * Each simulation is one list at `<prefix>:<simulation_id>`, newest
 * first. Every write refreshes the list's TTL, so a stream only expires
 * once its simulation stops emitting.
 *
 * No backend error crosses this boundary: writes report `false`, reads
 * report `[]`, cleanup reports the count it managed.
 */
export class EventStore {
  readonly keyPrefix: string;
  readonly maxEventsPerKey: number;
  readonly eventTtlSeconds: number;

  private readonly backend: EventBackend;
  private readonly log: BaseLogger;
  private readonly onStored: ((event: SimulationEvent) => Promise<void>) | undefined;
  private readonly stats: EventStoreStats = {
    events_stored: 0,
    events_retrieved: 0,
    malformed_records: 0,
    store_failures: 0,
    read_failures: 0,
    keys_cleaned: 0,
  };

  constructor(options: EventStoreOptions) {
    this.backend = options.backend;
    this.log = options.log;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.maxEventsPerKey = options.maxEventsPerKey ?? DEFAULT_MAX_EVENTS_PER_KEY;
    this.eventTtlSeconds = options.eventTtlSeconds ?? DEFAULT_EVENT_TTL_SECONDS;
    this.onStored = options.onStored;
  }

  /** Stream key for a simulation. */
  keyFor(simulationId: string): string {
    return `${this.keyPrefix}:${simulationId}`;
  }

  /**
   * Prepends the event to its simulation's stream and resets the TTL.
   * Resolves `false` instead of throwing on any failure.
   */
  async storeEvent(event: SimulationEvent): Promise<boolean> {
    const key = this.keyFor(event.simulation_id);

    try {
      await this.backend.pushHead(key, serializeEvent(event), this.eventTtlSeconds);
    } catch (err: unknown) {
      this.stats.store_failures++;
      this.log.error({ err, key, event_id: event.event_id }, 'Failed to store event');
      return false;
    }

    this.stats.events_stored++;
    this.log.debug({ key, event_id: event.event_id, event_type: event.event_type }, 'Event stored');

    if (this.onStored) {
      try {
        await this.onStored(event);
      } catch (err: unknown) {
        this.log.warn({ err, event_id: event.event_id }, 'Post-store hook failed');
      }
    }

    return true;
  }

  /**
   * Returns up to `limit` events from `offset`, newest-stored first.
   *
   * `limit <= 0` returns `[]` without touching the backend; a negative
   * or non-finite `offset` is treated as 0. Unparsable records are skipped.
   */
  async getEvents(
    simulationId: string,
    offset = 0,
    limit = DEFAULT_PAGE_LIMIT,
  ): Promise<SimulationEvent[]> {
    const size = Math.floor(limit);
    if (!(size > 0)) return [];

    const start = Number.isFinite(offset) ? Math.max(Math.floor(offset), 0) : 0;
    const key = this.keyFor(simulationId);

    let raw: string[];
    try {
      raw = await this.backend.range(key, start, start + size - 1);
    } catch (err: unknown) {
      this.stats.read_failures++;
      this.log.error({ err, key, offset: start, limit: size }, 'Failed to read events');
      return [];
    }

    const events: SimulationEvent[] = [];
    raw.forEach((record, i) => {
      const event = parseStoredEvent(record);
      if (event === null) {
        this.stats.malformed_records++;
        this.log.warn({ key, index: start + i }, 'Malformed event record, skipping');
        return;
      }
      events.push(event);
    });

    this.stats.events_retrieved += events.length;
    return events;
  }

  /** Every event of the stream, bounded by `maxEventsPerKey`. */
  async getAllEvents(simulationId: string): Promise<SimulationEvent[]> {
    return this.getEvents(simulationId, 0, this.maxEventsPerKey);
  }

  /**
   * Events of one type, in stream order.
   * Filtered client-side; there is no per-type index.
   */
  async getEventsByType(simulationId: string, eventType: string): Promise<SimulationEvent[]> {
    const events = await this.getAllEvents(simulationId);
    return events.filter((e) => e.event_type === eventType);
  }

  /**
   * Deletes every stream under the prefix whose TTL has run out, or that
   * was written without one.
   *
   * The expiry check and the delete happen in one backend step, so a
   * `storeEvent` racing with cleanup keeps its stream. The count only
   * includes keys this call actually removed.
   */
  async cleanupExpiredEvents(): Promise<number> {
    const pattern = `${this.keyPrefix}:*`;

    let keys: string[];
    try {
      keys = await this.backend.scan(pattern);
    } catch (err: unknown) {
      this.log.error({ err, pattern }, 'Failed to enumerate event keys');
      return 0;
    }

    let deleted = 0;
    for (const key of keys) {
      try {
        if (await this.backend.deleteIfExpired(key)) deleted++;
      } catch (err: unknown) {
        this.log.error({ err, key }, 'Failed to clean up event key');
      }
    }

    this.stats.keys_cleaned += deleted;
    if (deleted > 0) {
      this.log.info({ deleted, scanned: keys.length }, 'Expired event streams removed');
    }
    return deleted;
  }

  /** Snapshot of the store's counters. */
  getStats(): EventStoreStats {
    return { ...this.stats };
  }
}
