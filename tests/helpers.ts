import { vi } from 'vitest';
import type { SimulationEvent } from '../src/domain/index.js';
import type { Clock } from '../src/application/clock.js';

let counter = 0;

/** Fixed base time for deterministic timestamps. */
export const T0 = Date.parse('2024-01-01T10:00:00.000Z');

/** ISO timestamp `seconds` after T0. */
export function at(seconds: number): string {
  return new Date(T0 + seconds * 1000).toISOString();
}

/**
 * Factory for creating test events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<SimulationEvent> = {}): SimulationEvent {
  counter++;
  return {
    event_id: `event-${counter}`,
    event_type: 'progress_update',
    simulation_id: 'sim-123',
    timestamp: at(counter),
    data: {},
    priority: 'normal',
    ...overrides,
  };
}

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    level: 'info',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  };
}

/**
 * Manual clock: `sleep` returns at once and moves time forward, so a
 * paced replay finishes instantly while its arithmetic stays exact.
 */
export class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.sleeps.push(ms);
    this.time += ms;
  }
}

/** A promise plus its resolver, for holding a handler mid-call. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
