import { z } from 'zod';
import type { SimulationEvent } from '../domain/index.js';

// ISO-8601 with an explicit zone, so ordering never depends on the host's timezone
const isoTimestamp = z.string().datetime({ offset: true });

const priorityEnum = z.enum(['low', 'normal', 'high', 'critical']);

/**
 * Zod schema for one stored list element.
 *
 * Every field the store writes as required is required here; a record
 * missing one is unparsable and gets skipped by the reader. Unknown keys
 * are stripped so newer writers stay readable.
 */
export const storedEventSchema = z.object({
  event_id: z.string().min(1),
  event_type: z.string().min(1),
  simulation_id: z.string().min(1),
  timestamp: isoTimestamp,
  data: z.record(z.string(), z.unknown()),
  priority: priorityEnum,
  correlation_id: z.string().optional(),
  tags: z.array(z.string()).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

/**
 * Zod schema for an event submitted over HTTP.
 *
 * - `simulation_id` comes from the route, not the body.
 * - `event_id` is optional at ingestion; assigned by the handler if absent.
 * - `priority` defaults to "normal".
 */
export const eventInputSchema = z.object({
  event_id: z.string().min(1).max(255).optional(),
  event_type: z.string().min(1).max(255),
  timestamp: isoTimestamp,
  data: z.record(z.string(), z.unknown()).default({}),
  priority: priorityEnum.default('normal'),
  correlation_id: z.string().min(1).max(255).optional(),
  tags: z.array(z.string().min(1)).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export type EventInput = z.infer<typeof eventInputSchema>;

/**
 * Zod schema for POST /replays.
 * `speed_multiplier` must be strictly positive when present.
 */
export const replayRequestSchema = z.object({
  event_types: z.array(z.string().min(1)).optional(),
  speed_multiplier: z.number().positive().finite().optional(),
  start_time: isoTimestamp.optional(),
  end_time: isoTimestamp.optional(),
  tags: z.array(z.string().min(1)).optional(),
  max_events: z.number().int().positive().optional(),
});

export type ReplayRequest = z.infer<typeof replayRequestSchema>;

/** Serialises an event into the JSON document stored per list element. */
export function serializeEvent(event: SimulationEvent): string {
  return JSON.stringify({
    event_id: event.event_id,
    event_type: event.event_type,
    simulation_id: event.simulation_id,
    timestamp: event.timestamp,
    data: event.data,
    priority: event.priority,
    correlation_id: event.correlation_id,
    tags: event.tags,
    metadata: event.metadata,
  });
}

/**
 * Parses one stored list element.
 * Returns `null` for corrupt JSON or a record that fails validation.
 */
export function parseStoredEvent(raw: string): SimulationEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = storedEventSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
