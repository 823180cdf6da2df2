/**
 * Tests for Date Utilities
 */

import {
  MILLISECONDS_PER_HOUR,
  MILLISECONDS_PER_MINUTE,
  formatTimestamp,
  isValidTimeFormat,
  normalizeTimeInput,
  parseIsoTimestamp,
  parseIsoTimestampWithOffset,
} from '../logic/utils/dateUtils';

describe('Date Utilities', () => {
  describe('constants', () => {
    test('MILLISECONDS_PER_HOUR is correct', () => {
      expect(MILLISECONDS_PER_HOUR).toBe(3600000);
    });

    test('MILLISECONDS_PER_MINUTE is correct', () => {
      expect(MILLISECONDS_PER_MINUTE).toBe(60000);
    });
  });

  describe('parseIsoTimestamp', () => {
    test('parses UTC timestamps', () => {
      expect(parseIsoTimestamp('2024-01-15T06:30:00Z')?.toISOString()).toBe('2024-01-15T06:30:00.000Z');
    });

    test('parses fractional seconds', () => {
      expect(parseIsoTimestamp('2024-01-15T06:30:00.123Z')?.toISOString()).toBe('2024-01-15T06:30:00.123Z');
      expect(parseIsoTimestamp('2024-01-15T06:30:00.000000+00:00')?.toISOString()).toBe('2024-01-15T06:30:00.000Z');
    });

    test('converts offsets to UTC', () => {
      expect(parseIsoTimestamp('2024-01-15T08:00:00+02:00')?.toISOString()).toBe('2024-01-15T06:00:00.000Z');
      expect(parseIsoTimestamp('2024-01-15T00:30:00-0100')?.toISOString()).toBe('2024-01-15T01:30:00.000Z');
    });

    test('reads zone-less values as UTC', () => {
      expect(parseIsoTimestamp('2024-01-15T06:00:00')?.toISOString()).toBe('2024-01-15T06:00:00.000Z');
      expect(parseIsoTimestamp('2024-01-15')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
    });

    test('accepts a space between date and time', () => {
      expect(parseIsoTimestamp('2024-01-15 06:00:00')?.toISOString()).toBe('2024-01-15T06:00:00.000Z');
    });

    test('rejects impossible calendar values', () => {
      expect(parseIsoTimestamp('2024-02-30T00:00:00Z')).toBeUndefined();
      expect(parseIsoTimestamp('2024-13-01')).toBeUndefined();
      expect(parseIsoTimestamp('2024-01-15T25:00:00Z')).toBeUndefined();
    });

    test('accepts leap days', () => {
      expect(parseIsoTimestamp('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
      expect(parseIsoTimestamp('2023-02-29')).toBeUndefined();
    });

    test('rejects non-ISO strings', () => {
      expect(parseIsoTimestamp('not a date')).toBeUndefined();
      expect(parseIsoTimestamp('15.01.2024')).toBeUndefined();
      expect(parseIsoTimestamp('')).toBeUndefined();
    });
  });

  describe('parseIsoTimestampWithOffset', () => {
    test('keeps the written offset in minutes east of UTC', () => {
      expect(parseIsoTimestampWithOffset('2024-01-15T10:00:00+02:00')?.offsetMinutes).toBe(120);
      expect(parseIsoTimestampWithOffset('2024-01-15T10:00:00-0530')?.offsetMinutes).toBe(-330);
      expect(parseIsoTimestampWithOffset('2024-01-15T10:00:00Z')?.offsetMinutes).toBe(0);
      expect(parseIsoTimestampWithOffset('2024-01-15')?.offsetMinutes).toBe(0);
    });

    test('rejects what parseIsoTimestamp rejects', () => {
      expect(parseIsoTimestampWithOffset('2024-02-30')).toBeUndefined();
    });
  });

  describe('formatTimestamp', () => {
    test('shows the wall-clock time of a given offset', () => {
      expect(formatTimestamp(new Date('2024-01-15T08:00:00Z'), 120)).toBe('2024-01-15 10:00:00');
      expect(formatTimestamp(new Date('2024-01-15T22:30:00Z'), 120)).toBe('2024-01-16 00:30:00');
      expect(formatTimestamp(new Date('2024-01-15T02:00:00Z'), -330)).toBe('2024-01-14 20:30:00');
    });

    test('formats as YYYY-MM-DD HH:MM:SS in UTC', () => {
      expect(formatTimestamp(new Date('2024-01-15T06:05:09.999Z'))).toBe('2024-01-15 06:05:09');
    });

    test('pads single-digit fields', () => {
      expect(formatTimestamp(new Date(Date.UTC(2024, 0, 1, 0, 0, 0)))).toBe('2024-01-01 00:00:00');
    });

    test('throws for invalid dates', () => {
      expect(() => formatTimestamp(new Date(NaN))).toThrow('Invalid date');
    });
  });

  describe('isValidTimeFormat', () => {
    test('accepts the three prompt formats', () => {
      expect(isValidTimeFormat('2024-01-15')).toBe(true);
      expect(isValidTimeFormat('2024-01-15T06:00:00')).toBe(true);
      expect(isValidTimeFormat('2024-01-15T06:00:00Z')).toBe(true);
    });

    test('rejects other ISO variants and garbage', () => {
      expect(isValidTimeFormat('2024-01-15T06:00')).toBe(false);
      expect(isValidTimeFormat('2024-01-15T06:00:00+02:00')).toBe(false);
      expect(isValidTimeFormat('yesterday')).toBe(false);
      expect(isValidTimeFormat('')).toBe(false);
    });

    test('rejects impossible dates in a valid shape', () => {
      expect(isValidTimeFormat('2024-02-31')).toBe(false);
    });
  });

  describe('normalizeTimeInput', () => {
    test('appends midnight UTC to a bare date', () => {
      expect(normalizeTimeInput('2024-01-15')).toBe('2024-01-15T00:00:00Z');
    });

    test('appends Z to a zone-less date-time', () => {
      expect(normalizeTimeInput('2024-01-15T06:00:00')).toBe('2024-01-15T06:00:00Z');
    });

    test('keeps a full UTC timestamp', () => {
      expect(normalizeTimeInput('2024-01-15T06:00:00Z')).toBe('2024-01-15T06:00:00Z');
    });
  });
});
