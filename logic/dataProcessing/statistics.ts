import { DataProcessingError } from '../utils/errorUtils';
import { getColumnValues, hasColumn, isNumericString } from './tableConverter';
import { VALUE_COLUMN, type DataTable, type StatsSummary } from './types';

/**
 * Coerce one cell of the value column to a float.
 * @returns The number, or undefined for a missing cell
 * @throws DataProcessingError for anything that is not numeric
 */
export function coerceValue(value: unknown, index: number): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (isNumericString(value)) {
    return Number(value);
  }
  throw new DataProcessingError(
    `Failed to calculate statistics: value ${JSON.stringify(value) ?? String(value)} in row ${index} is not numeric`,
  );
}

/**
 * Median with linear interpolation between the two middle elements
 * @param sorted - Ascending, non-empty
 */
export function median(sorted: ReadonlyArray<number>): number {
  const position = (sorted.length - 1) / 2;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (position - lower) * (sorted[upper] - sorted[lower]);
}

/**
 * Sample standard deviation (N-1 denominator)
 * @returns undefined when fewer than two values are given
 */
export function sampleStdDev(values: ReadonlyArray<number>, mean: number): number | undefined {
  if (values.length < 2) {
    return undefined;
  }
  const squaredDeviations = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return Math.sqrt(squaredDeviations / (values.length - 1));
}

/**
 * Calculate descriptive statistics over the `value` column.
 * An empty table, or one without a `value` column, yields an empty summary.
 * `count` is the row count, including rows whose value is missing.
 * @throws DataProcessingError if a value cannot be read as a float
 */
export function calculateStats(table: DataTable): StatsSummary {
  if (table.rows.length === 0 || !hasColumn(table, VALUE_COLUMN)) {
    return Object.freeze({});
  }

  const values: number[] = [];
  getColumnValues(table, VALUE_COLUMN).forEach((cell, index) => {
    const value = coerceValue(cell, index);
    if (value !== undefined) {
      values.push(value);
    }
  });

  const count = table.rows.length;
  if (values.length === 0) {
    return Object.freeze({ count });
  }

  const sorted = [...values].sort((a, b) => a - b);
  const average = values.reduce((sum, v) => sum + v, 0) / values.length;
  const stdDev = sampleStdDev(values, average);

  return Object.freeze({
    count,
    average,
    maximum: sorted[sorted.length - 1],
    minimum: sorted[0],
    median: median(sorted),
    ...(stdDev === undefined ? {} : { stdDev }),
  });
}
