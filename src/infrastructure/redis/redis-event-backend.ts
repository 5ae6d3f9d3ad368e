import type { Redis } from 'ioredis';
import type { EventBackend } from '../store/event-backend.js';

const SCAN_COUNT = 100;

// TTL -1: no expiry, 0: due. -2 (missing) is left alone.
const DELETE_IF_EXPIRED = `
local ttl = redis.call('TTL', KEYS[1])
if ttl == -1 or ttl == 0 then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

/**
 * ioredis-backed event backend.
 *
 * Streams are plain Redis lists: `LPUSH` prepends, `LRANGE` pages.
 * Push and `EXPIRE` run inside one `MULTI` so a concurrent cleanup never
 * observes a freshly created list without its TTL.
 */
export class RedisEventBackend implements EventBackend {
  constructor(private readonly redis: Redis) {}

  async pushHead(key: string, value: string, ttlSeconds: number): Promise<void> {
    const results = await this.redis
      .multi()
      .lpush(key, value)
      .expire(key, ttlSeconds)
      .exec();

    // null = transaction discarded (WATCH conflict or connection reset)
    if (results === null) {
      throw new Error(`Transaction discarded for key ${key}`);
    }

    for (const [err] of results) {
      if (err) throw err;
    }
  }

  async range(key: string, start: number, stop: number): Promise<string[]> {
    return this.redis.lrange(key, start, stop);
  }

  async ttl(key: string): Promise<number> {
    return this.redis.ttl(key);
  }

  /**
   * Cursor-based `SCAN` rather than `KEYS`, so enumeration never blocks
   * the server. May return a key more than once; callers de-duplicate.
   */
  async scan(pattern: string): Promise<string[]> {
    const keys = new Set<string>();
    let cursor = '0';

    do {
      const [next, batch] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
      for (const key of batch) keys.add(key);
      cursor = next;
    } while (cursor !== '0');

    return [...keys];
  }

  async delete(key: string): Promise<number> {
    return this.redis.del(key);
  }

  /** Runs as one Lua script, so no `LPUSH` can land between `TTL` and `DEL`. */
  async deleteIfExpired(key: string): Promise<boolean> {
    const removed = await this.redis.eval(DELETE_IF_EXPIRED, 1, key);
    return removed === 1;
  }

  async ping(): Promise<string> {
    return this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
