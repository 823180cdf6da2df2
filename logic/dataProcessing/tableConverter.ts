import { z } from 'zod';
import { parseIsoTimestampWithOffset, type ParsedTimestamp } from '../utils/dateUtils';
import { DataProcessingError } from '../utils/errorUtils';
import { START_TIME_COLUMN, type DataTable, type TableRow } from './types';

/**
 * Tabular conversion of raw API records.
 * Pass-through except for `start_time` parsing: no sorting, filtering or
 * deduplication.
 */

const NUMERIC_STRING = /^\s*[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?\s*$/i;

export type RawRecord = Record<string, unknown>;

function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// records pass through by reference, so a "__proto__" key survives validation
export const recordListSchema = z.array(z.custom<RawRecord>(isRawRecord, { message: 'Expected object' }));

function parseStartTime(value: unknown, index: number): ParsedTimestamp | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new DataProcessingError(
      `Failed to convert data to table: start_time of record ${index} is not a string`,
    );
  }
  const parsed = parseIsoTimestampWithOffset(value);
  if (!parsed) {
    throw new DataProcessingError(
      `Failed to convert data to table: unparseable start_time "${value}" in record ${index}`,
    );
  }
  return parsed;
}

/**
 * Convert raw API records into a table
 * @param records - Parsed JSON body, expected to be a list of objects
 * @returns Table preserving every key and the original row order
 * @throws DataProcessingError if the shape is wrong or a start_time is unparseable
 */
export function toTable(records: unknown): DataTable {
  const result = recordListSchema.safeParse(records);
  if (!result.success) {
    throw new DataProcessingError(
      `Failed to convert data to table: expected a list of records (${result.error.issues[0]?.message ?? 'invalid shape'})`,
      { cause: result.error },
    );
  }

  const columns: string[] = [];
  const seen = new Set<string>();
  const rows: TableRow[] = result.data.map((record, index) => {
    const entries = Object.entries(record);
    let startTime: ParsedTimestamp | undefined;

    for (const [key, value] of entries) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
      if (key === START_TIME_COLUMN) {
        startTime = parseStartTime(value, index);
      }
    }

    // fromEntries defines own properties, so a "__proto__" key stays a field
    const fields: Record<string, unknown> = Object.fromEntries(entries.filter(([key]) => key !== START_TIME_COLUMN));
    return startTime
      ? { startTime: startTime.date, startTimeOffset: startTime.offsetMinutes, fields }
      : { fields };
  });

  return { columns, rows };
}

/**
 * Check whether a cell holds a number written as a string, e.g. "1200.5"
 */
export function isNumericString(value: unknown): value is string {
  return typeof value === 'string' && NUMERIC_STRING.test(value);
}

/**
 * Check whether any source record carried the given key
 */
export function hasColumn(table: DataTable, column: string): boolean {
  return table.columns.includes(column);
}

/**
 * Read one column in row order; missing cells come back as undefined
 */
export function getColumnValues(table: DataTable, column: string): unknown[] {
  if (column === START_TIME_COLUMN) {
    return table.rows.map((row) => row.startTime);
  }
  return table.rows.map((row) => (Object.hasOwn(row.fields, column) ? row.fields[column] : undefined));
}

/**
 * Read the table back as plain records, `start_time` as an ISO string
 */
export function tableToRecords(table: DataTable): RawRecord[] {
  return table.rows.map((row) => {
    if (!row.startTime) {
      return { ...row.fields };
    }
    return { [START_TIME_COLUMN]: row.startTime.toISOString(), ...row.fields };
  });
}
