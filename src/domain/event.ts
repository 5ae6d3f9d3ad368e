/**
 * Core domain types for simulation events.
 *
 * These types define the canonical shape of an event as it is stored
 * and replayed. They carry no framework dependencies.
 */

/** Free-form key/value payload attached to every event. */
export type EventData = Record<string, unknown>;

/** Informational priority. Never affects storage or replay order. */
export const EventPriority = {
  LOW: 'low',
  NORMAL: 'normal',
  HIGH: 'high',
  CRITICAL: 'critical',
} as const;

export type EventPriority = (typeof EventPriority)[keyof typeof EventPriority];

/**
 * Event types emitted by the simulation engine.
 *
 * `event_type` stays an open string: producers may emit tags outside
 * this list and the store keeps them as-is.
 */
export const SimulationEventType = {
  SIMULATION_STARTED: 'simulation_started',
  SIMULATION_COMPLETED: 'simulation_completed',
  SIMULATION_FAILED: 'simulation_failed',
  SIMULATION_PAUSED: 'simulation_paused',
  SIMULATION_RESUMED: 'simulation_resumed',
  PHASE_STARTED: 'phase_started',
  PHASE_COMPLETED: 'phase_completed',
  PHASE_FAILED: 'phase_failed',
  DOCUMENT_GENERATED: 'document_generated',
  WORKFLOW_EXECUTED: 'workflow_executed',
  ANALYSIS_COMPLETED: 'analysis_completed',
  PROGRESS_UPDATE: 'progress_update',
  ERROR_OCCURRED: 'error_occurred',
  SYSTEM_EVENT: 'system_event',
} as const;

export type SimulationEventType = (typeof SimulationEventType)[keyof typeof SimulationEventType];

/**
 * Canonical simulation event.
 *
 * `timestamp` is when the event occurred, not when it was stored.
 * Events are never updated in place; corrections are new events.
 */
export interface SimulationEvent {
  readonly event_id: string;
  readonly event_type: string;
  readonly simulation_id: string;
  readonly timestamp: string; // ISO-8601
  readonly data: EventData;
  readonly priority: EventPriority;
  readonly correlation_id?: string;
  readonly tags?: readonly string[];
  readonly metadata?: Record<string, unknown>;
}

/** Async consumer driven by a replay. Its return value is ignored. */
export type EventHandler = (event: SimulationEvent) => Promise<void>;
