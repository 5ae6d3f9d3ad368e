export { eventInputSchema, replayRequestSchema, storedEventSchema, serializeEvent, parseStoredEvent } from './event-schema.js';
export type { EventInput, ReplayRequest } from './event-schema.js';
export {
  EventStore,
  DEFAULT_KEY_PREFIX,
  DEFAULT_MAX_EVENTS_PER_KEY,
  DEFAULT_EVENT_TTL_SECONDS,
  DEFAULT_PAGE_LIMIT,
} from './event-store.js';
export type { EventStoreOptions, EventStoreStats } from './event-store.js';
export { ReplayManager, InvalidReplayOptionsError, DEFAULT_MAX_REPLAY_EVENTS } from './replay-manager.js';
export type { ReplayOptions, ReplayProgress, ReplaySummary, ReplayManagerOptions } from './replay-manager.js';
export { ReplaySessionRegistry } from './replay-sessions.js';
export type { ReplaySessionStatus, SessionOptions } from './replay-sessions.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { describeEvent, buildTimeline, computeStatistics } from './event-timeline.js';
export type { TimelineEntry, EventStatistics } from './event-timeline.js';
