import { describe, it, expect } from 'vitest';
import {
  eventInputSchema,
  replayRequestSchema,
  parseStoredEvent,
  serializeEvent,
} from '../../src/application/event-schema.js';
import { makeEvent, at } from '../helpers.js';

describe('serializeEvent', () => {
  it('writes the fields in a fixed order and omits absent optionals', () => {
    const event = makeEvent({
      event_id: 'e1',
      event_type: 'phase_started',
      simulation_id: 'sim-1',
      timestamp: '2024-01-01T10:00:00.000Z',
      data: { phase_name: 'planning' },
      priority: 'high',
    });

    expect(serializeEvent(event)).toBe(
      '{"event_id":"e1","event_type":"phase_started","simulation_id":"sim-1",'
        + '"timestamp":"2024-01-01T10:00:00.000Z","data":{"phase_name":"planning"},"priority":"high"}',
    );
  });

  it('keeps optional fields when present', () => {
    const event = makeEvent({ correlation_id: 'corr-1', tags: ['a'], metadata: { source: 'engine' } });

    expect(JSON.parse(serializeEvent(event))).toMatchObject({
      correlation_id: 'corr-1',
      tags: ['a'],
      metadata: { source: 'engine' },
    });
  });
});

describe('parseStoredEvent', () => {
  it('reads back what serializeEvent wrote', () => {
    const event = makeEvent({ tags: ['x', 'y'], correlation_id: 'c' });

    expect(parseStoredEvent(serializeEvent(event))).toEqual(event);
  });

  it('returns null for invalid JSON', () => {
    expect(parseStoredEvent('{not json')).toBeNull();
  });

  it.each([
    ['event_id'],
    ['event_type'],
    ['simulation_id'],
    ['timestamp'],
    ['data'],
    ['priority'],
  ])('returns null when %s is missing', (field) => {
    const record: Record<string, unknown> = JSON.parse(serializeEvent(makeEvent()));
    delete record[field];

    expect(parseStoredEvent(JSON.stringify(record))).toBeNull();
  });

  it('returns null for an unknown priority', () => {
    const raw = serializeEvent(makeEvent()).replace('"priority":"normal"', '"priority":"urgent"');

    expect(parseStoredEvent(raw)).toBeNull();
  });

  it('returns null for an unparsable timestamp', () => {
    const raw = serializeEvent(makeEvent({ timestamp: 'not-a-date' }));

    expect(parseStoredEvent(raw)).toBeNull();
  });

  it('returns null for a JSON value that is not an object', () => {
    expect(parseStoredEvent('42')).toBeNull();
    expect(parseStoredEvent('null')).toBeNull();
  });
});

describe('eventInputSchema', () => {
  it('applies defaults for data and priority', () => {
    const parsed = eventInputSchema.parse({ event_type: 'simulation_started', timestamp: at(0) });

    expect(parsed).toEqual({ event_type: 'simulation_started', timestamp: at(0), data: {}, priority: 'normal' });
  });

  it('rejects an empty event_type', () => {
    expect(eventInputSchema.safeParse({ event_type: '', timestamp: at(0) }).success).toBe(false);
  });

  it('rejects a malformed timestamp', () => {
    const result = eventInputSchema.safeParse({ event_type: 'x', timestamp: 'soon' });

    expect(result.success).toBe(false);
  });

  it.each(['January 1, 2024', '2024-01-01 10:00', '2024-01-01T10:00:00'])(
    'rejects %s, which is not ISO-8601 with a zone',
    (timestamp) => {
      expect(eventInputSchema.safeParse({ event_type: 'x', timestamp }).success).toBe(false);
    },
  );

  it('accepts UTC and offset timestamps', () => {
    expect(eventInputSchema.safeParse({ event_type: 'x', timestamp: '2024-01-01T10:00:00Z' }).success).toBe(true);
    expect(
      eventInputSchema.safeParse({ event_type: 'x', timestamp: '2024-01-01T12:00:00.250+02:00' }).success,
    ).toBe(true);
  });
});

describe('replayRequestSchema', () => {
  it('accepts an empty body', () => {
    expect(replayRequestSchema.parse({})).toEqual({});
  });

  it.each([0, -2])('rejects speed_multiplier %s', (speed_multiplier) => {
    expect(replayRequestSchema.safeParse({ speed_multiplier }).success).toBe(false);
  });

  it('rejects a fractional max_events', () => {
    expect(replayRequestSchema.safeParse({ max_events: 1.5 }).success).toBe(false);
  });
});
