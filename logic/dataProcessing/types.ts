export const START_TIME_COLUMN = 'start_time';
export const VALUE_COLUMN = 'value';

/**
 * One observation as returned by the API, after timestamp parsing.
 */
export interface TableRow {
  /** Parsed `start_time`, when the source record carried one */
  readonly startTime?: Date;
  /** Zone offset `start_time` was written in, minutes east of UTC */
  readonly startTimeOffset?: number;
  /** Every other source key, values untouched */
  readonly fields: Readonly<Record<string, unknown>>;
}

/**
 * Rows in arrival order plus the union of source keys in first-seen order.
 */
export interface DataTable {
  readonly columns: ReadonlyArray<string>;
  readonly rows: ReadonlyArray<TableRow>;
}

/**
 * Descriptive statistics over the `value` column.
 * Every field is absent for an empty table.
 */
export interface StatsSummary {
  readonly count?: number;
  readonly average?: number;
  readonly maximum?: number;
  readonly minimum?: number;
  readonly median?: number;
  /** Sample standard deviation (N-1); absent below two values */
  readonly stdDev?: number;
}
