import { describe, expect, it } from 'vitest';
import {
  formatInstant,
  normalizeBooking,
  normalizeTimeWindow,
  parseTimeZone,
  resolveInstant
} from '../src/bookings/normalizer.js';
import { ConfigError, InvalidBooking, InvalidTimeFormat } from '../src/errors.js';

describe('parseTimeZone', () => {
  it('accepts fixed offsets in several spellings', () => {
    expect(parseTimeZone('UTC')).toMatchObject({ kind: 'fixed', offsetMinutes: 0 });
    expect(parseTimeZone('UTC-4')).toMatchObject({ kind: 'fixed', offsetMinutes: -240 });
    expect(parseTimeZone('+05:30')).toMatchObject({ kind: 'fixed', offsetMinutes: 330 });
    expect(parseTimeZone('GMT+2')).toMatchObject({ kind: 'fixed', offsetMinutes: 120 });
  });

  it('accepts IANA names', () => {
    expect(parseTimeZone('America/New_York')).toMatchObject({ kind: 'iana', label: 'America/New_York' });
  });

  it('rejects unknown zones with a ConfigError', () => {
    expect(() => parseTimeZone('Mars/Olympus_Mons')).toThrow(ConfigError);
    expect(() => parseTimeZone('  ')).toThrow(ConfigError);
    expect(() => parseTimeZone('+15:00')).toThrow(ConfigError);
  });
});

describe('resolveInstant', () => {
  const utcMinus4 = parseTimeZone('UTC-4');

  it('combines a bare time with the booking date in the configured zone', () => {
    const start = resolveInstant('2025-06-25', '01:02', utcMinus4);
    expect(start.toISOString()).toBe('2025-06-25T05:02:00.000Z');
    expect(formatInstant(start, utcMinus4)).toBe('2025-06-25T01:02:00-04:00');
  });

  it('accepts seconds on bare times', () => {
    expect(resolveInstant('2025-06-25', '01:02:03', utcMinus4).toISOString()).toBe('2025-06-25T05:02:03.000Z');
  });

  it('uses an offset-aware timestamp unchanged and ignores the date', () => {
    const instant = resolveInstant('2030-01-01', '2025-06-25T01:02:00-04:00', utcMinus4);
    expect(instant.toISOString()).toBe('2025-06-25T05:02:00.000Z');
  });

  it('accepts a space separator, Z and compact offsets', () => {
    const utc = parseTimeZone('UTC');
    expect(resolveInstant('2025-06-25', '2025-06-25 01:02:00Z', utc).toISOString()).toBe(
      '2025-06-25T01:02:00.000Z'
    );
    expect(resolveInstant('2025-06-25', '2025-06-25T01:02:00+0200', utc).toISOString()).toBe(
      '2025-06-24T23:02:00.000Z'
    );
    expect(resolveInstant('2025-06-25', '2025-06-25T01:02:00.250+02', utc).toISOString()).toBe(
      '2025-06-24T23:02:00.250Z'
    );
  });

  it('follows daylight saving time for IANA zones', () => {
    const newYork = parseTimeZone('America/New_York');
    expect(resolveInstant('2025-06-25', '01:02', newYork).toISOString()).toBe('2025-06-25T05:02:00.000Z');
    const winter = resolveInstant('2025-01-15', '09:30', newYork);
    expect(winter.toISOString()).toBe('2025-01-15T14:30:00.000Z');
    expect(formatInstant(winter, newYork)).toBe('2025-01-15T09:30:00-05:00');
  });

  it('rejects unrecognized and impossible values', () => {
    expect(() => resolveInstant('2025-06-25', '1:02', utcMinus4)).toThrow(InvalidTimeFormat);
    expect(() => resolveInstant('2025-06-25', '25:00', utcMinus4)).toThrow(InvalidTimeFormat);
    expect(() => resolveInstant('2025-06-25', 'noon', utcMinus4)).toThrow(InvalidTimeFormat);
    expect(() => resolveInstant('2025-02-30', '10:00', utcMinus4)).toThrow(InvalidTimeFormat);
    expect(() => resolveInstant('25/06/2025', '10:00', utcMinus4)).toThrow(InvalidTimeFormat);
  });
});

describe('normalizeTimeWindow', () => {
  const zone = parseTimeZone('UTC-4');

  it('returns both ends of the window', () => {
    const window = normalizeTimeWindow('2025-06-25', '01:02', '01:05', zone);
    expect(formatInstant(window.start, zone)).toBe('2025-06-25T01:02:00-04:00');
    expect(formatInstant(window.end, zone)).toBe('2025-06-25T01:05:00-04:00');
  });

  it('mixes bare and offset-aware values', () => {
    const window = normalizeTimeWindow('2025-06-25', '01:02', '2025-06-25T05:05:00Z', zone);
    expect(window.end.getTime() - window.start.getTime()).toBe(3 * 60 * 1000);
  });

  it('rejects a non-positive window', () => {
    let caught: unknown;
    try {
      normalizeTimeWindow('2025-06-25', '01:05', '01:05', zone);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidBooking);
    expect(caught).toMatchObject({ kind: 'invalid-window' });
    expect(() => normalizeTimeWindow('2025-06-25', '02:00', '01:00', zone)).toThrow(InvalidBooking);
  });
});

describe('normalizeBooking', () => {
  const zone = parseTimeZone('UTC');
  const row = {
    id: 42,
    camera_id: 'cam-1',
    user_id: 'user-7',
    date: '2025-06-25',
    start_time: '10:00',
    end_time: '10:30:00',
    status: 'Scheduled'
  };

  it('validates a source row into a booking', () => {
    const booking = normalizeBooking(row, zone);
    expect(booking).toEqual({
      id: '42',
      cameraId: 'cam-1',
      userId: 'user-7',
      date: '2025-06-25',
      startsAt: new Date('2025-06-25T10:00:00.000Z'),
      endsAt: new Date('2025-06-25T10:30:00.000Z'),
      status: 'scheduled'
    });
  });

  it('reports missing fields with the booking id', () => {
    expect(() => normalizeBooking({ ...row, camera_id: '' }, zone)).toThrow('Booking field "camera_id" is missing');
    try {
      normalizeBooking({ ...row, camera_id: undefined }, zone);
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidBooking);
      expect(error).toMatchObject({ bookingId: '42', kind: 'malformed' });
    }
  });

  it('rejects unknown statuses and non-object rows', () => {
    expect(() => normalizeBooking({ ...row, status: 'paused' }, zone)).toThrow(InvalidBooking);
    expect(() => normalizeBooking('booking', zone)).toThrow(InvalidBooking);
    expect(() => normalizeBooking(null, zone)).toThrow(InvalidBooking);
  });

  it('tags an inverted window with the booking id', () => {
    try {
      normalizeBooking({ ...row, start_time: '11:00' }, zone);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ name: 'InvalidBooking', bookingId: '42', kind: 'invalid-window' });
    }
  });
});
