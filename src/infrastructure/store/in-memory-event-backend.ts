import type { EventBackend } from './event-backend.js';

interface ListEntry {
  items: string[];
  expiresAt: number | null;
}

/**
 * Converts a Redis-style glob (only `*` and `?`) into an anchored RegExp.
 */
function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

/**
 * Process-local event backend.
 *
 * Used when no Redis is configured and as the substitute backend in
 * tests. Unlike Redis it never expires keys on its own: an elapsed key
 * reads as empty and reports a TTL of 0 until `cleanupExpiredEvents`
 * deletes it.
 */
export class InMemoryEventBackend implements EventBackend {
  private readonly lists: Map<string, ListEntry> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  async pushHead(key: string, value: string, ttlSeconds: number): Promise<void> {
    const existing = this.lists.get(key);
    const entry = existing && !this.isElapsed(existing) ? existing : { items: [], expiresAt: null };
    entry.items.unshift(value);
    entry.expiresAt = this.now() + ttlSeconds * 1000;
    this.lists.set(key, entry);
  }

  async range(key: string, start: number, stop: number): Promise<string[]> {
    const entry = this.lists.get(key);
    if (!entry || this.isElapsed(entry)) return [];

    const len = entry.items.length;
    const from = start < 0 ? Math.max(len + start, 0) : start;
    const to = stop < 0 ? len + stop : Math.min(stop, len - 1);
    if (from > to) return [];
    return entry.items.slice(from, to + 1);
  }

  async ttl(key: string): Promise<number> {
    const entry = this.lists.get(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.max(Math.ceil((entry.expiresAt - this.now()) / 1000), 0);
  }

  async scan(pattern: string): Promise<string[]> {
    const re = globToRegExp(pattern);
    return [...this.lists.keys()].filter((key) => re.test(key));
  }

  async delete(key: string): Promise<number> {
    return this.lists.delete(key) ? 1 : 0;
  }

  async deleteIfExpired(key: string): Promise<boolean> {
    const entry = this.lists.get(key);
    if (!entry) return false;
    if (entry.expiresAt !== null && !this.isElapsed(entry)) return false;
    return this.lists.delete(key);
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  async close(): Promise<void> {
    this.lists.clear();
  }

  private isElapsed(entry: ListEntry): boolean {
    return entry.expiresAt !== null && entry.expiresAt <= this.now();
  }
}
