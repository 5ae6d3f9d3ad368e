/**
 * Key-value primitives the event store is built on.
 *
 * Any store that can prepend to a list, range-read it, report and set a
 * per-key TTL, enumerate keys by pattern and delete a key satisfies the
 * contract. Implementations may throw; the event store catches.
 */
export interface EventBackend {
  /**
   * Prepends `value` to the list at `key` and (re)sets the key's TTL,
   * as one round-trip so no reader sees the list without an expiry.
   */
  pushHead(key: string, value: string, ttlSeconds: number): Promise<void>;

  /** Inclusive index range, Redis `LRANGE` semantics. Missing key → `[]`. */
  range(key: string, start: number, stop: number): Promise<string[]>;

  /** Remaining TTL in seconds; `-1` when the key never expires, `-2` when missing. */
  ttl(key: string): Promise<number>;

  /** Keys matching a glob pattern such as `simulation_events:*`. */
  scan(pattern: string): Promise<string[]>;

  /** Deletes a key; resolves with the number of keys removed (0 or 1). */
  delete(key: string): Promise<number>;

  /**
   * Deletes `key` only if its TTL has run out or it has none, checked and
   * applied in one step so a write landing in between is never removed.
   * A missing key resolves `false`.
   */
  deleteIfExpired(key: string): Promise<boolean>;

  /** Connectivity probe used by the health route. */
  ping(): Promise<string>;

  close(): Promise<void>;
}
