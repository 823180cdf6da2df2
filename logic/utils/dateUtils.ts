/**
 * Date and Time Utilities
 *
 * Pure functions for ISO-8601 parsing, display formatting and validation of
 * the time ranges typed at the prompt.
 */

/**
 * Milliseconds in one hour
 */
export const MILLISECONDS_PER_HOUR = 60 * 60 * 1000;

/**
 * Milliseconds in one minute
 */
export const MILLISECONDS_PER_MINUTE = 60 * 1000;

const ISO_8601_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/** Formats accepted at the time prompt */
const INPUT_TIME_PATTERNS = [
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/,
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/,
  /^\d{4}-\d{2}-\d{2}$/,
];

/**
 * Parse a zone designator into an offset in minutes east of UTC
 * @param zone - "Z", "+02:00", "-0530", "+01" or undefined (read as UTC)
 */
function parseZoneOffset(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = digits.length > 2 ? parseInt(digits.slice(2), 10) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * An instant plus the zone offset it was written in
 */
export interface ParsedTimestamp {
  date: Date;
  /** Minutes east of UTC; 0 for "Z" or no designator */
  offsetMinutes: number;
}

/**
 * Parse an ISO-8601 date or date-time string, keeping its zone offset.
 * Strings without a zone designator are read as UTC. Impossible calendar
 * values (month 13, February 30th, hour 25) are rejected.
 * @param value - The string to parse
 * @returns Parsed timestamp, or undefined if the string is not valid ISO-8601
 */
export function parseIsoTimestampWithOffset(value: string): ParsedTimestamp | undefined {
  const match = ISO_8601_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '', zone] = match;
  const year = parseInt(y, 10);
  const month = parseInt(mo, 10);
  const day = parseInt(d, 10);
  const hour = parseInt(h, 10);
  const minute = parseInt(mi, 10);
  const second = parseInt(s, 10);
  const millisecond = fraction ? parseInt(fraction.padEnd(3, '0').slice(0, 3), 10) : 0;

  const wallClock = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millisecond));
  // Date.UTC rolls over out-of-range fields; a mismatch means the input was impossible
  if (
    wallClock.getUTCFullYear() !== year
    || wallClock.getUTCMonth() !== month - 1
    || wallClock.getUTCDate() !== day
    || wallClock.getUTCHours() !== hour
    || wallClock.getUTCMinutes() !== minute
    || wallClock.getUTCSeconds() !== second
  ) {
    return undefined;
  }

  const offsetMinutes = parseZoneOffset(zone);
  if (Math.abs(offsetMinutes) >= 24 * 60) {
    return undefined;
  }
  return {
    date: new Date(wallClock.getTime() - offsetMinutes * MILLISECONDS_PER_MINUTE),
    offsetMinutes,
  };
}

/**
 * Parse an ISO-8601 date or date-time string into a Date
 * @returns Parsed Date, or undefined if the string is not valid ISO-8601
 */
export function parseIsoTimestamp(value: string): Date | undefined {
  return parseIsoTimestampWithOffset(value)?.date;
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Format a Date as "YYYY-MM-DD HH:MM:SS" wall-clock time, without zone suffix
 * @param offsetMinutes - Zone offset to show the time in (defaults to UTC)
 */
export function formatTimestamp(instant: Date, offsetMinutes: number = 0): string {
  if (Number.isNaN(instant.getTime())) {
    throw new RangeError('Invalid date');
  }
  const date = new Date(instant.getTime() + offsetMinutes * MILLISECONDS_PER_MINUTE);
  const datePart = `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
  const timePart = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  return `${datePart} ${timePart}`;
}

/**
 * Check whether a prompt answer is one of the accepted time formats
 * (YYYY-MM-DD, YYYY-MM-DDTHH:MM:SS or YYYY-MM-DDTHH:MM:SSZ) and a real
 * calendar value.
 */
export function isValidTimeFormat(value: string): boolean {
  if (!INPUT_TIME_PATTERNS.some((pattern) => pattern.test(value))) {
    return false;
  }
  return parseIsoTimestamp(value) !== undefined;
}

/**
 * Normalize a validated prompt answer to a full UTC ISO-8601 string
 * - "2024-01-15" -> "2024-01-15T00:00:00Z"
 * - "2024-01-15T06:00:00" -> "2024-01-15T06:00:00Z"
 */
export function normalizeTimeInput(value: string): string {
  if (!value.includes('T')) {
    return `${value}T00:00:00Z`;
  }
  if (!value.endsWith('Z')) {
    return `${value}Z`;
  }
  return value;
}
