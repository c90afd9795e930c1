/**
 * Zoned timestamp helpers built on Intl.DateTimeFormat.
 * A ZonedDateTime is an instant plus the IANA zone it should be shown in.
 */

export const HOUR_MS = 60 * 60 * 1000;

export interface ZonedDateTime {
  readonly epochMs: number;
  readonly timeZone: string;
}

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: string;
  monthName: string;
  offsetMinutes: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatterCache.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'long',
      day: 'numeric',
      weekday: 'long',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric'
    });
    formatterCache.set(timeZone, fmt);
  }
  return fmt;
}

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

/**
 * Returns true when the runtime knows the zone identifier.
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone.trim()) return false;
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

// 0001-01-01T00:00:00Z through 9999-12-31T23:59:59Z
const MIN_EPOCH_SECONDS = -62135596800;
const MAX_EPOCH_SECONDS = 253402300799;

/**
 * Throws a RangeError for instants outside years 1 to 9999, which the
 * formatters below cannot render.
 */
export function fromEpochSeconds(seconds: number, timeZone: string): ZonedDateTime {
  const whole = Math.trunc(seconds);
  if (!Number.isFinite(whole) || whole < MIN_EPOCH_SECONDS || whole > MAX_EPOCH_SECONDS) {
    throw new RangeError(`Timestamp out of range: ${seconds}`);
  }
  return { epochMs: whole * 1000, timeZone };
}

export function fromDate(date: Date, timeZone: string): ZonedDateTime {
  return { epochMs: date.getTime(), timeZone };
}

export function subtractHours(date: Date, hours: number): Date {
  return new Date(date.getTime() - hours * HOUR_MS);
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function zonedParts(value: ZonedDateTime): ZonedParts {
  const wholeSecondMs = Math.floor(value.epochMs / 1000) * 1000;
  const map: Record<string, string> = {};
  for (const part of formatterFor(value.timeZone).formatToParts(new Date(wholeSecondMs))) {
    map[part.type] = part.value;
  }

  const year = Number(map.year);
  const monthName = map.month ?? '';
  const month = MONTHS.indexOf(monthName) + 1;
  const day = Number(map.day);
  const hour = Number(map.hour);
  const minute = Number(map.minute);
  const second = Number(map.second);

  const wallAsUtc = Date.UTC(year, month - 1, day, hour, minute, second);
  const offsetMinutes = Math.round((wallAsUtc - wholeSecondMs) / 60000);

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    weekday: map.weekday ?? '',
    monthName,
    offsetMinutes
  };
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`;
}

/** `2025-03-01T09:30:00+00:00` */
export function toIsoString(value: ZonedDateTime): string {
  const p = zonedParts(value);
  return `${p.year}-${pad2(p.month)}-${pad2(p.day)}T${pad2(p.hour)}:${pad2(p.minute)}:${pad2(p.second)}${formatOffset(p.offsetMinutes)}`;
}

/** `2025-03-01 09:30` */
export function formatDateTime(value: ZonedDateTime): string {
  const p = zonedParts(value);
  return `${p.year}-${pad2(p.month)}-${pad2(p.day)} ${pad2(p.hour)}:${pad2(p.minute)}`;
}

/** `Saturday, 01 March 2025` */
export function formatLongDate(value: ZonedDateTime): string {
  const p = zonedParts(value);
  return `${p.weekday}, ${pad2(p.day)} ${p.monthName} ${p.year}`;
}

export function compareNewestFirst(a: ZonedDateTime, b: ZonedDateTime): number {
  return b.epochMs - a.epochMs;
}
