export { createRedisClient } from './client.js';
export { RedisEventBackend } from './redis-event-backend.js';
export { createRedisEventPublisher, createLoggingEventPublisher, eventChannel } from './event-publisher.js';
export type { EventPublisher } from './event-publisher.js';
