export type { EventBackend } from './event-backend.js';
export { InMemoryEventBackend } from './in-memory-event-backend.js';
