import { setTimeout as delay } from 'node:timers/promises';

/**
 * Time source used by replay pacing.
 *
 * Injected so tests can drive replays without waiting in real time.
 */
export interface Clock {
  /** Milliseconds, monotonic within a process. */
  now(): number;
  /** Resolves after `ms`; rejects with the signal's reason if aborted first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms, signal) => {
    try {
      await delay(ms, undefined, signal ? { signal } : undefined);
    } catch (err: unknown) {
      if (signal?.aborted) throw signal.reason;
      throw err;
    }
  },
};
