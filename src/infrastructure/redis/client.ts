import { Redis } from 'ioredis';

/** Attempts per command before it fails while Redis is unreachable. */
const MAX_RETRIES_PER_REQUEST = 2;
/** Upper bound on any single command, connected or not. */
const COMMAND_TIMEOUT_MS = 5_000;

/**
 * Creates the shared ioredis connection.
 *
 * `lazyConnect` so the caller decides when to pay the connection cost
 * and can surface a failed connect at boot. Commands fail after a few
 * reconnect attempts instead of queueing forever, so an outage reaches
 * the event store as an error it can turn into `false` or `[]`.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: MAX_RETRIES_PER_REQUEST,
    commandTimeout: COMMAND_TIMEOUT_MS,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
