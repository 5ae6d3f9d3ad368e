import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryEventBackend } from '../../src/infrastructure/store/in-memory-event-backend.js';

let now: number;
let backend: InMemoryEventBackend;

beforeEach(() => {
  now = 1_000_000;
  backend = new InMemoryEventBackend(() => now);
});

describe('InMemoryEventBackend', () => {
  it('prepends values so the newest comes first', async () => {
    await backend.pushHead('k', 'a', 60);
    await backend.pushHead('k', 'b', 60);
    await backend.pushHead('k', 'c', 60);

    expect(await backend.range('k', 0, -1)).toEqual(['c', 'b', 'a']);
  });

  it('follows LRANGE index rules', async () => {
    for (const v of ['e', 'd', 'c', 'b', 'a']) await backend.pushHead('k', v, 60);

    expect(await backend.range('k', 1, 2)).toEqual(['b', 'c']);
    expect(await backend.range('k', 3, 100)).toEqual(['d', 'e']);
    expect(await backend.range('k', -2, -1)).toEqual(['d', 'e']);
    expect(await backend.range('k', -100, 0)).toEqual(['a']);
    expect(await backend.range('k', 5, 9)).toEqual([]);
    expect(await backend.range('k', 3, 1)).toEqual([]);
  });

  it('reads a missing key as empty', async () => {
    expect(await backend.range('missing', 0, 10)).toEqual([]);
  });

  it('reports TTL in whole seconds, rounded up', async () => {
    await backend.pushHead('k', 'a', 60);
    now += 59_500;

    expect(await backend.ttl('k')).toBe(1);
  });

  it('reports -2 for a missing key', async () => {
    expect(await backend.ttl('missing')).toBe(-2);
  });

  it('keeps an elapsed key until it is deleted', async () => {
    await backend.pushHead('k', 'a', 10);
    now += 10_000;

    expect(await backend.ttl('k')).toBe(0);
    expect(await backend.range('k', 0, -1)).toEqual([]);
    expect(await backend.scan('*')).toEqual(['k']);
    expect(await backend.delete('k')).toBe(1);
    expect(await backend.delete('k')).toBe(0);
    expect(await backend.ttl('k')).toBe(-2);
  });

  it('deletes only elapsed keys through deleteIfExpired', async () => {
    await backend.pushHead('old', 'a', 10);
    await backend.pushHead('live', 'b', 60);
    now += 10_000;

    expect(await backend.deleteIfExpired('old')).toBe(true);
    expect(await backend.deleteIfExpired('live')).toBe(false);
    expect(await backend.deleteIfExpired('missing')).toBe(false);
    expect(await backend.scan('*')).toEqual(['live']);
  });

  it('does not delete a key refreshed after it elapsed', async () => {
    await backend.pushHead('k', 'old', 10);
    now += 20_000;
    await backend.pushHead('k', 'new', 10);

    expect(await backend.deleteIfExpired('k')).toBe(false);
    expect(await backend.range('k', 0, -1)).toEqual(['new']);
  });

  it('starts a fresh list when pushing onto an elapsed key', async () => {
    await backend.pushHead('k', 'old', 10);
    now += 20_000;
    await backend.pushHead('k', 'new', 10);

    expect(await backend.range('k', 0, -1)).toEqual(['new']);
    expect(await backend.ttl('k')).toBe(10);
  });

  it('matches keys against a glob pattern', async () => {
    await backend.pushHead('simulation_events:a', 'x', 60);
    await backend.pushHead('simulation_events:b', 'x', 60);
    await backend.pushHead('simulation_eventsXc', 'x', 60);
    await backend.pushHead('other:a', 'x', 60);

    expect(await backend.scan('simulation_events:*')).toEqual(['simulation_events:a', 'simulation_events:b']);
    expect(await backend.scan('other:?')).toEqual(['other:a']);
  });

  it('answers ping and forgets everything on close', async () => {
    await backend.pushHead('k', 'a', 60);

    expect(await backend.ping()).toBe('PONG');
    await backend.close();
    expect(await backend.scan('*')).toEqual([]);
  });
});
