import type { BaseLogger } from 'pino';
import type { EventHandler, SimulationEvent } from '../domain/index.js';
import type { EventStore } from './event-store.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';

export const DEFAULT_MAX_REPLAY_EVENTS = 10_000;

export interface ReplayOptions {
  /** Only replay these event types. Empty means all types. */
  eventTypes?: readonly string[];
  /**
   * Divides the recorded gaps between events (2 = twice as fast).
   * Unset means no pacing: events go out as fast as the handler allows.
   */
  speedMultiplier?: number;
  /** Inclusive lower bound on event timestamps. */
  startTime?: string | Date;
  /** Inclusive upper bound on event timestamps. */
  endTime?: string | Date;
  /** Keep events carrying at least one of these tags. */
  tags?: readonly string[];
  /** Stop after this many events (applied after filtering). */
  maxEvents?: number;
  /** Checked before each event; aborting also cuts a pending wait short. */
  signal?: AbortSignal;
  /** Called after every handler invocation. */
  onProgress?: (progress: ReplayProgress) => void;
}

export interface ReplayProgress {
  processed: number;
  total: number;
  event_id: string;
  succeeded: boolean;
}

/** Outcome of one replay run. Durations are in seconds. */
export interface ReplaySummary {
  total_events: number;
  successful_events: number;
  failed_events: number;
  average_processing_time: number;
  total_replay_time: number;
}

export interface ReplayManagerOptions {
  eventStore: EventStore;
  log: BaseLogger;
  maxReplayEvents?: number;
  clock?: Clock;
}

/** Raised before any work when replay options make no sense. */
export class InvalidReplayOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidReplayOptionsError';
  }
}

interface TimedEvent {
  event: SimulationEvent;
  ts: number;
  /** Insertion rank; breaks timestamp ties. */
  seq: number;
}

function toMillis(value: string | Date, name: string): number {
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  if (!Number.isFinite(ms)) {
    throw new InvalidReplayOptionsError(`${name} must be a valid timestamp`);
  }
  return ms;
}

/**
 * Re-drives a simulation's stored events through a handler.
 *
 * Each call works on its own snapshot of the stream; the manager keeps
 * nothing between calls, so concurrent replays of one simulation do not
 * interfere with each other or with writers.
 */
export class ReplayManager {
  readonly maxReplayEvents: number;

  private readonly eventStore: EventStore;
  private readonly log: BaseLogger;
  private readonly clock: Clock;

  constructor(options: ReplayManagerOptions) {
    this.eventStore = options.eventStore;
    this.log = options.log;
    this.maxReplayEvents = options.maxReplayEvents ?? DEFAULT_MAX_REPLAY_EVENTS;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Replays events in ascending timestamp order.
   *
   * The store returns newest-stored first, so events are re-sorted here;
   * equal timestamps keep insertion order. With a speed multiplier, the
   * loop waits `gap / speedMultiplier` before every event but the first.
   * A handler that throws is counted as failed and the replay moves on.
   *
   * @throws InvalidReplayOptionsError for a non-positive speed multiplier
   *   or an unparsable time bound.
   */
  async replayEvents(
    simulationId: string,
    handler: EventHandler,
    options: ReplayOptions = {},
  ): Promise<ReplaySummary> {
    const { speedMultiplier, signal } = options;
    if (speedMultiplier !== undefined && !(Number.isFinite(speedMultiplier) && speedMultiplier > 0)) {
      throw new InvalidReplayOptionsError('speedMultiplier must be a positive number');
    }
    const from = options.startTime !== undefined ? toMillis(options.startTime, 'startTime') : undefined;
    const to = options.endTime !== undefined ? toMillis(options.endTime, 'endTime') : undefined;

    const startedAt = this.clock.now();
    signal?.throwIfAborted();

    const fetched = await this.eventStore.getEvents(simulationId, 0, this.maxReplayEvents);
    const selected = this.select(fetched, { ...options, from, to });

    let successful = 0;
    let failed = 0;
    let processingMs = 0;
    let previousTs: number | undefined;

    for (const { event, ts } of selected) {
      signal?.throwIfAborted();

      if (previousTs !== undefined && speedMultiplier !== undefined) {
        const gapMs = ts - previousTs;
        if (gapMs > 0) {
          await this.clock.sleep(gapMs / speedMultiplier, signal);
        }
      }
      previousTs = ts;

      const callStart = this.clock.now();
      let succeeded = true;
      try {
        await handler(event);
        successful++;
      } catch (err: unknown) {
        succeeded = false;
        failed++;
        this.log.warn(
          { err, simulation_id: simulationId, event_id: event.event_id, event_type: event.event_type },
          'Replay handler failed',
        );
      }
      processingMs += this.clock.now() - callStart;

      options.onProgress?.({
        processed: successful + failed,
        total: selected.length,
        event_id: event.event_id,
        succeeded,
      });
    }

    const calls = successful + failed;
    const summary: ReplaySummary = {
      total_events: selected.length,
      successful_events: successful,
      failed_events: failed,
      average_processing_time: calls > 0 ? processingMs / calls / 1000 : 0,
      total_replay_time: (this.clock.now() - startedAt) / 1000,
    };

    this.log.info({ simulation_id: simulationId, ...summary }, 'Replay finished');
    return summary;
  }

  private select(
    fetched: readonly SimulationEvent[],
    filters: ReplayOptions & { from: number | undefined; to: number | undefined },
  ): TimedEvent[] {
    // An empty list filters nothing, same as leaving it out.
    const types = filters.eventTypes && filters.eventTypes.length > 0 ? new Set(filters.eventTypes) : null;
    const tags = filters.tags && filters.tags.length > 0 ? new Set(filters.tags) : null;
    const { from, to } = filters;

    const ordered = fetched
      .map((event, i) => ({ event, ts: Date.parse(event.timestamp), seq: fetched.length - 1 - i }))
      .sort((a, b) => a.ts - b.ts || a.seq - b.seq)
      .filter(({ event, ts }) =>
        (types === null || types.has(event.event_type))
        && (from === undefined || ts >= from)
        && (to === undefined || ts <= to)
        && (tags === null || (event.tags ?? []).some((t) => tags.has(t))));

    return filters.maxEvents !== undefined ? ordered.slice(0, Math.max(filters.maxEvents, 0)) : ordered;
  }
}
