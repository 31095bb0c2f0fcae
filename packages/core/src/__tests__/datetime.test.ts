import { describe, expect, it } from 'vitest';
import {
  LEAP_SECOND_POLICY,
  PvlDate,
  PvlDateTime,
  PvlTime,
  formatOffset,
  parseDate,
  parseDateTime,
  parseTime,
} from '../datetime.js';
import { DecodeError } from '../errors.js';

const lenient = { numericTimeZones: true, leapSeconds: true };
const strict = { numericTimeZones: false, leapSeconds: false };

describe('Dates and times', () => {
  describe('parseDate', () => {
    it('reads calendar and day-of-year forms', () => {
      expect(parseDate('2024-02-29')).toEqual(new PvlDate(2024, 2, 29));
      expect(parseDate('2000-060')).toEqual(new PvlDate(2000, 2, 29));
      expect(parseDate('2001-365')).toEqual(new PvlDate(2001, 12, 31));
    });

    it('rejects impossible dates', () => {
      expect(parseDate('2001-02-29')).toBeUndefined();
      expect(parseDate('2001-366')).toBeUndefined();
      expect(parseDate('2001-13-01')).toBeUndefined();
      expect(parseDate('0000-01-01')).toBeUndefined();
    });
  });

  describe('parseTime', () => {
    it('reads minutes, seconds and fractions', () => {
      expect(parseTime('01:02', strict)).toEqual(new PvlTime(1, 2));
      expect(parseTime('01:02:03Z', strict)).toEqual(new PvlTime(1, 2, 3));
      expect(parseTime('01:02:03.25', strict)).toEqual(new PvlTime(1, 2, 3, 250000));
    });

    it('gates leap seconds and numeric offsets on the options', () => {
      expect(parseTime('23:59:60', strict)).toBeUndefined();
      expect(parseTime('23:59:60', lenient)?.isLeapSecond).toBe(true);
      expect(parseTime('10:00+0530', strict)).toBeUndefined();
      expect(parseTime('10:00+0530', lenient)?.utcOffset).toBe(330);
    });

    it('rejects offsets beyond twelve hours', () => {
      expect(parseTime('10:00+13', lenient)).toBeUndefined();
    });
  });

  describe('parseDateTime', () => {
    it('dispatches on the separator', () => {
      expect(parseDateTime('2001-01-01', strict)).toBeInstanceOf(PvlDate);
      expect(parseDateTime('2001-01-01Z', strict)).toBeInstanceOf(PvlDate);
      expect(parseDateTime('12:00', strict)).toBeInstanceOf(PvlTime);
      expect(parseDateTime('2001-01-01T12:00', strict)).toBeInstanceOf(PvlDateTime);
      expect(parseDateTime('2001-01-01T', strict)).toBeUndefined();
      expect(parseDateTime('Titan', strict)).toBeUndefined();
    });
  });

  describe('formatting', () => {
    it('writes only the fields that are set', () => {
      expect(new PvlTime(1, 2).toString()).toBe('01:02');
      expect(new PvlTime(1, 2, 3).toString()).toBe('01:02:03');
      expect(new PvlTime(1, 2, 3, 4).toString()).toBe('01:02:03.000004');
      expect(new PvlDate(987, 6, 5).toString()).toBe('0987-06-05');
    });

    it('renders offsets', () => {
      expect(formatOffset(0)).toBe('');
      expect(formatOffset(0, 'Z')).toBe('Z');
      expect(formatOffset(420)).toBe('+07');
      expect(formatOffset(-330)).toBe('-05:30');
      expect(new PvlTime(1, 2, 0, 0, -330).toJSON()).toBe('01:02-05:30');
      expect(new PvlTime(1, 2).toJSON()).toBe('01:02Z');
    });
  });

  describe('PvlDateTime.toDate', () => {
    it('applies the UTC offset', () => {
      const value = new PvlDateTime(new PvlDate(2001, 1, 1), new PvlTime(12, 0, 0, 0, 60));
      expect(value.toDate().toISOString()).toBe('2001-01-01T11:00:00.000Z');
    });

    it('refuses leap seconds instead of clamping them', () => {
      expect(LEAP_SECOND_POLICY).toBe('preserve');
      const value = new PvlDateTime(new PvlDate(2016, 12, 31), new PvlTime(23, 59, 60));
      expect(value.time.second).toBe(60);
      expect(() => value.toDate()).toThrow(DecodeError);
    });
  });
});
