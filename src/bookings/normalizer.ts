import { ConfigError, InvalidBooking, InvalidTimeFormat } from '../errors.js';
import { BOOKING_STATUSES, type Booking, type BookingStatus } from '../types.js';

export type TimeZone =
  | { kind: 'fixed'; label: string; offsetMinutes: number }
  | { kind: 'iana'; label: string; formatter: Intl.DateTimeFormat };

export type TimeWindow = {
  start: Date;
  end: Date;
};

const BARE_TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const OFFSET_TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}(?::?\d{2})?)$/i;
const FIXED_ZONE_PATTERN = /^(?:(?:UTC|GMT)\s*)?([+-])(\d{1,2})(?::?(\d{2}))?$/i;

const MINUTE_MS = 60_000;

export function parseTimeZone(value: string): TimeZone {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigError('Time zone must be a non-empty string');
  }

  if (/^(?:utc|gmt|z)$/i.test(trimmed)) {
    return { kind: 'fixed', label: 'UTC', offsetMinutes: 0 };
  }

  const fixed = FIXED_ZONE_PATTERN.exec(trimmed);
  if (fixed) {
    const [, sign, hours, minutes] = fixed;
    const total = Number(hours) * 60 + Number(minutes ?? 0);
    if (Number(hours) > 14 || Number(minutes ?? 0) > 59) {
      throw new ConfigError(`Time zone offset "${value}" is out of range`);
    }
    return { kind: 'fixed', label: trimmed, offsetMinutes: sign === '-' ? -total : total };
  }

  try {
    const formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: trimmed,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit'
    });
    return { kind: 'iana', label: trimmed, formatter };
  } catch {
    throw new ConfigError(`Unknown time zone "${value}"`);
  }
}

/** Offset of `zone` from UTC at the given instant, in minutes. */
export function offsetAt(zone: TimeZone, instantMs: number): number {
  if (zone.kind === 'fixed') {
    return zone.offsetMinutes;
  }

  const parts: Record<string, number> = {};
  for (const part of zone.formatter.formatToParts(new Date(instantMs))) {
    if (part.type !== 'literal') {
      parts[part.type] = Number(part.value);
    }
  }
  const wallAsUtc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second
  );
  const truncated = Math.floor(instantMs / 1000) * 1000;
  return Math.round((wallAsUtc - truncated) / MINUTE_MS);
}

function wallClockToInstant(zone: TimeZone, wallMs: number): number {
  // two passes settle on the right side of a DST transition
  const first = wallMs - offsetAt(zone, wallMs) * MINUTE_MS;
  return wallMs - offsetAt(zone, first) * MINUTE_MS;
}

function parseCalendarDate(date: string): { year: number; month: number; day: number } {
  const match = DATE_PATTERN.exec(date.trim());
  if (!match) {
    throw new InvalidTimeFormat(date, `Unrecognized booking date "${date}"`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day
  ) {
    throw new InvalidTimeFormat(date, `Booking date "${date}" is not a calendar date`);
  }
  return { year, month, day };
}

function normalizeOffset(offset: string): string {
  if (offset.toUpperCase() === 'Z') {
    return 'Z';
  }
  const sign = offset[0];
  const digits = offset.slice(1).replace(':', '');
  const hours = digits.slice(0, 2);
  const minutes = digits.length > 2 ? digits.slice(2) : '00';
  return `${sign}${hours}:${minutes}`;
}

export function resolveInstant(date: string, value: string, zone: TimeZone): Date {
  const trimmed = value.trim();

  const bare = BARE_TIME_PATTERN.exec(trimmed);
  if (bare) {
    const hours = Number(bare[1]);
    const minutes = Number(bare[2]);
    const seconds = Number(bare[3] ?? 0);
    if (hours > 23 || minutes > 59 || seconds > 59) {
      throw new InvalidTimeFormat(value, `Time "${value}" is out of range`);
    }
    const { year, month, day } = parseCalendarDate(date);
    const wallMs = Date.UTC(year, month - 1, day, hours, minutes, seconds);
    return new Date(wallClockToInstant(zone, wallMs));
  }

  const stamped = OFFSET_TIMESTAMP_PATTERN.exec(trimmed);
  if (stamped) {
    const [, datePart, timePart, offset] = stamped;
    const parsed = Date.parse(`${datePart}T${timePart}${normalizeOffset(offset)}`);
    if (Number.isNaN(parsed)) {
      throw new InvalidTimeFormat(value);
    }
    return new Date(parsed);
  }

  throw new InvalidTimeFormat(value);
}

export function normalizeTimeWindow(
  date: string,
  startTime: string,
  endTime: string,
  zone: TimeZone
): TimeWindow {
  const start = resolveInstant(date, startTime, zone);
  const end = resolveInstant(date, endTime, zone);
  if (end.getTime() <= start.getTime()) {
    throw new InvalidBooking(
      `Booking window ${startTime}..${endTime} on ${date} has a non-positive duration`,
      null,
      'invalid-window'
    );
  }
  return { start, end };
}

function readField(row: Record<string, unknown>, key: string, bookingId: string | null): string {
  const value = row[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidBooking(`Booking field "${key}" is missing`, bookingId);
  }
  return value.trim();
}

function isBookingStatus(value: string): value is BookingStatus {
  return (BOOKING_STATUSES as readonly string[]).includes(value);
}

/**
 * Validates an untyped source row into a {@link Booking}. Throws `InvalidBooking` or
 * `InvalidTimeFormat`; callers skip the row and continue with the rest.
 */
export function normalizeBooking(raw: unknown, zone: TimeZone): Booking {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InvalidBooking('Booking row must be an object');
  }
  const row = raw as Record<string, unknown>;
  const idValue = row.id;
  const bookingId =
    typeof idValue === 'string' || typeof idValue === 'number' ? String(idValue) : null;

  const id = readField(row, 'id', bookingId);
  const cameraId = readField(row, 'camera_id', bookingId);
  const userId = readField(row, 'user_id', bookingId);
  const date = readField(row, 'date', bookingId);
  const startTime = readField(row, 'start_time', bookingId);
  const endTime = readField(row, 'end_time', bookingId);
  const status = readField(row, 'status', bookingId).toLowerCase();

  if (!isBookingStatus(status)) {
    throw new InvalidBooking(`Booking status "${status}" is not recognized`, id);
  }

  let window: TimeWindow;
  try {
    window = normalizeTimeWindow(date, startTime, endTime, zone);
  } catch (error) {
    if (error instanceof InvalidBooking) {
      throw new InvalidBooking(error.message, id, error.kind);
    }
    throw error;
  }

  return {
    id,
    cameraId,
    userId,
    date,
    startsAt: window.start,
    endsAt: window.end,
    status
  };
}

function pad(value: number, width = 2): string {
  return String(Math.abs(value)).padStart(width, '0');
}

export function formatInstant(instant: Date | number, zone: TimeZone): string {
  const instantMs = typeof instant === 'number' ? instant : instant.getTime();
  const offset = offsetAt(zone, instantMs);
  const wall = new Date(instantMs + offset * MINUTE_MS);
  const sign = offset < 0 ? '-' : '+';
  const offsetLabel = `${sign}${pad(Math.trunc(offset / 60))}:${pad(offset % 60)}`;
  return (
    `${wall.getUTCFullYear()}-${pad(wall.getUTCMonth() + 1)}-${pad(wall.getUTCDate())}` +
    `T${pad(wall.getUTCHours())}:${pad(wall.getUTCMinutes())}:${pad(wall.getUTCSeconds())}` +
    offsetLabel
  );
}
