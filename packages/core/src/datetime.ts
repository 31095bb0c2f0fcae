// ============================================================================
// @pvlkit/core - Date/Time Values
// ============================================================================
//
// Dates, times and date-times as plain structured values. A JS Date cannot
// hold a seconds field of 60, so parsed values keep their fields as given
// and only convert on request.
//
// ============================================================================

import { DecodeError } from './errors.js';

/**
 * How a seconds value of 60 is handled. Leap seconds are kept as a
 * structured time with `second === 60`; they are never clamped or rolled
 * into the next minute. Conversion to a JS Date refuses them.
 */
export const LEAP_SECOND_POLICY = 'preserve' as const;

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

export class PvlDate {
  constructor(
    public readonly year: number,
    public readonly month: number,
    public readonly day: number,
  ) {}

  equals(other: PvlDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export class PvlTime {
  /**
   * @param utcOffset - Offset from UTC in minutes; 0 is UTC.
   */
  constructor(
    public readonly hour: number,
    public readonly minute: number,
    public readonly second = 0,
    public readonly microsecond = 0,
    public readonly utcOffset = 0,
  ) {}

  get isLeapSecond(): boolean {
    return this.second === 60;
  }

  equals(other: PvlTime): boolean {
    return (
      this.hour === other.hour &&
      this.minute === other.minute &&
      this.second === other.second &&
      this.microsecond === other.microsecond &&
      this.utcOffset === other.utcOffset
    );
  }

  /** `HH:MM`, plus seconds and microseconds when they are set. No zone. */
  toString(): string {
    let s = `${pad(this.hour)}:${pad(this.minute)}`;
    if (this.microsecond !== 0) {
      s += `:${pad(this.second)}.${pad(this.microsecond, 6)}`;
    } else if (this.second !== 0) {
      s += `:${pad(this.second)}`;
    }
    return s;
  }

  toJSON(): string {
    return this.toString() + formatOffset(this.utcOffset, 'Z');
  }
}

export class PvlDateTime {
  constructor(
    public readonly date: PvlDate,
    public readonly time: PvlTime,
  ) {}

  equals(other: PvlDateTime): boolean {
    return this.date.equals(other.date) && this.time.equals(other.time);
  }

  /**
   * Convert to a JS Date.
   * @throws DecodeError for a leap second, which a Date cannot represent.
   */
  toDate(): Date {
    if (this.time.isLeapSecond) {
      throw new DecodeError('A leap second cannot be represented as a Date', this.toString());
    }
    const { year, month, day } = this.date;
    const { hour, minute, second, microsecond, utcOffset } = this.time;
    const ms = Date.UTC(year, month - 1, day, hour, minute, second, Math.floor(microsecond / 1000));
    const result = new Date(ms - utcOffset * 60_000);
    // Date.UTC maps years 0-99 onto 1900-1999.
    if (year < 100) result.setUTCFullYear(result.getUTCFullYear() - 1900);
    return result;
  }

  toString(): string {
    return `${this.date.toString()}T${this.time.toString()}`;
  }

  toJSON(): string {
    return `${this.date.toString()}T${this.time.toJSON()}`;
  }
}

export type PvlDateTimeValue = PvlDate | PvlTime | PvlDateTime;

export function isDateTimeValue(value: unknown): value is PvlDateTimeValue {
  return value instanceof PvlDate || value instanceof PvlTime || value instanceof PvlDateTime;
}

/**
 * Render a UTC offset in minutes as `+HH` or `+HH:MM`. `utc` is returned
 * for a zero offset.
 */
export function formatOffset(minutes: number, utc = ''): string {
  if (minutes === 0) return utc;
  const sign = minutes < 0 ? '-' : '+';
  const abs = Math.abs(minutes);
  const hours = Math.floor(abs / 60);
  const rest = abs % 60;
  return rest === 0 ? `${sign}${pad(hours)}` : `${sign}${pad(hours)}:${pad(rest)}`;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export interface DateTimeParseOptions {
  /** Accept `+7`, `-07`, `+05:30` style offsets after a time. */
  numericTimeZones: boolean;
  /** Accept a seconds value of 60. */
  leapSeconds: boolean;
}

const DATE_RE =
  /^(?<year>\d{4})-(?:(?<month>0[1-9]|1[0-2])-(?<day>0[1-9]|[12]\d|3[01])|(?<doy>\d{3}))$/;

const TIME_RE =
  /^(?<hour>[01]\d|2[0-3]):(?<minute>[0-5]\d)(?::(?<second>[0-5]\d|60)(?:\.(?<fraction>\d{1,6}))?)?(?<zone>[Zz]|[+-](?:1[0-2]|0?\d)(?::?[0-5]\d)?)?$/;

const OFFSET_RE = /^(?<sign>[+-])(?<hours>1[0-2]|0?\d)(?::?(?<minutes>[0-5]\d))?$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** True when every field of `date` is one a date literal can carry. */
export function isValidDate({ year, month, day }: PvlDate): boolean {
  if (![year, month, day].every(Number.isInteger)) return false;
  if (year < 1 || year > 9999 || month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

/** True when every field of `time` is one a time literal can carry. Zones are not checked. */
export function isValidTime({ hour, minute, second, microsecond }: PvlTime): boolean {
  if (![hour, minute, second, microsecond].every(Number.isInteger)) return false;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return false;
  return second >= 0 && second <= 60 && microsecond >= 0 && microsecond < 1_000_000;
}

/** Parse `YYYY-MM-DD` or `YYYY-DDD` (day of year). */
export function parseDate(text: string): PvlDate | undefined {
  const groups = DATE_RE.exec(text)?.groups;
  if (!groups) return undefined;

  const year = Number(groups.year);
  if (year === 0) return undefined;

  if (groups.doy !== undefined) {
    let remaining = Number(groups.doy);
    if (remaining < 1 || remaining > (isLeapYear(year) ? 366 : 365)) return undefined;
    let month = 1;
    while (remaining > daysInMonth(year, month)) {
      remaining -= daysInMonth(year, month);
      month++;
    }
    return new PvlDate(year, month, remaining);
  }

  const month = Number(groups.month);
  const day = Number(groups.day);
  if (day > daysInMonth(year, month)) return undefined;
  return new PvlDate(year, month, day);
}

/** Parse `HH:MM[:SS[.ffffff]]` with an optional zone suffix. */
export function parseTime(text: string, options: DateTimeParseOptions): PvlTime | undefined {
  const groups = TIME_RE.exec(text)?.groups;
  if (!groups) return undefined;

  const second = groups.second !== undefined ? Number(groups.second) : 0;
  if (second === 60 && !options.leapSeconds) return undefined;

  const microsecond = groups.fraction !== undefined ? Number(groups.fraction.padEnd(6, '0')) : 0;

  let utcOffset = 0;
  const zone = groups.zone;
  if (zone !== undefined && zone.toUpperCase() !== 'Z') {
    if (!options.numericTimeZones) return undefined;
    const offset = OFFSET_RE.exec(zone)?.groups;
    if (!offset) return undefined;
    const minutes = Number(offset.hours) * 60 + Number(offset.minutes ?? '0');
    utcOffset = offset.sign === '-' ? -minutes : minutes;
  }

  return new PvlTime(Number(groups.hour), Number(groups.minute), second, microsecond, utcOffset);
}

/**
 * Parse a date, a time, or a `dateTtime`. A trailing `Z` on a bare date is
 * accepted. Returns undefined when the text is none of these.
 */
export function parseDateTime(text: string, options: DateTimeParseOptions): PvlDateTimeValue | undefined {
  const t = text.indexOf('T');
  if (t !== -1) {
    const date = parseDate(text.slice(0, t));
    const time = date ? parseTime(text.slice(t + 1), options) : undefined;
    return date && time ? new PvlDateTime(date, time) : undefined;
  }

  if (text.includes(':')) return parseTime(text, options);

  return parseDate(text.endsWith('Z') ? text.slice(0, -1) : text);
}
