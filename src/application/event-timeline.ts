import type { SimulationEvent } from '../domain/index.js';
import { SimulationEventType } from '../domain/index.js';

export interface TimelineEntry {
  timestamp: string;
  event_type: string;
  description: string;
  data: Record<string, unknown>;
  tags: string[];
}

export interface EventStatistics {
  total_events: number;
  event_types: Record<string, number>;
  priorities: Record<string, number>;
  time_range: { start: string | null; end: string | null };
}

function field(event: SimulationEvent, key: string): string {
  const value = event.data[key];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : 'Unknown';
}

/** Human-readable line for a timeline entry. */
export function describeEvent(event: SimulationEvent): string {
  switch (event.event_type) {
    case SimulationEventType.SIMULATION_STARTED:
      return 'Simulation execution began';
    case SimulationEventType.SIMULATION_COMPLETED:
      return 'Simulation finished successfully';
    case SimulationEventType.SIMULATION_FAILED:
      return 'Simulation encountered an error';
    case SimulationEventType.PHASE_STARTED:
      return `Phase '${field(event, 'phase_name')}' began`;
    case SimulationEventType.PHASE_COMPLETED:
      return `Phase '${field(event, 'phase_name')}' completed`;
    case SimulationEventType.DOCUMENT_GENERATED:
      return `Document '${field(event, 'document_title')}' generated`;
    case SimulationEventType.WORKFLOW_EXECUTED:
      return `Workflow '${field(event, 'workflow_name')}' executed`;
    case SimulationEventType.ANALYSIS_COMPLETED:
      return 'Analysis completed';
    case SimulationEventType.ERROR_OCCURRED:
      return `Error occurred: ${field(event, 'error')}`;
    default:
      return `Event: ${event.event_type}`;
  }
}

function byTimestamp(a: SimulationEvent, b: SimulationEvent): number {
  return Date.parse(a.timestamp) - Date.parse(b.timestamp);
}

/** Oldest-first view of a simulation, one described entry per event. */
export function buildTimeline(events: readonly SimulationEvent[]): TimelineEntry[] {
  return [...events].sort(byTimestamp).map((event) => ({
    timestamp: event.timestamp,
    event_type: event.event_type,
    description: describeEvent(event),
    data: event.data,
    tags: event.tags ? [...event.tags] : [],
  }));
}

/** Counts per type and priority, plus the covered time range. */
export function computeStatistics(events: readonly SimulationEvent[]): EventStatistics {
  const event_types: Record<string, number> = {};
  const priorities: Record<string, number> = {};

  for (const event of events) {
    event_types[event.event_type] = (event_types[event.event_type] ?? 0) + 1;
    priorities[event.priority] = (priorities[event.priority] ?? 0) + 1;
  }

  const sorted = [...events].sort(byTimestamp);

  return {
    total_events: events.length,
    event_types,
    priorities,
    time_range: {
      start: sorted[0]?.timestamp ?? null,
      end: sorted.at(-1)?.timestamp ?? null,
    },
  };
}
