export { default as eventStorePlugin } from './event-store-plugin.js';
export type { EventStorePluginOptions } from './event-store-plugin.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';
export { InMemoryEventBackend } from './store/index.js';
export type { EventBackend } from './store/index.js';
export {
  createRedisClient,
  RedisEventBackend,
  createRedisEventPublisher,
  createLoggingEventPublisher,
  eventChannel,
} from './redis/index.js';
export type { EventPublisher } from './redis/index.js';
