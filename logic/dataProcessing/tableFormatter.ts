import { formatTimestamp } from '../utils/dateUtils';
import { DataProcessingError, ValidationError, extractErrorMessage } from '../utils/errorUtils';
import { getColumnValues, hasColumn, isNumericString } from './tableConverter';
import { START_TIME_COLUMN, VALUE_COLUMN, type DataTable, type TableRow } from './types';

export const DEFAULT_MAX_ROWS = 20;
export const NO_DATA_MESSAGE = 'No data available.';

/** Extra width every column gets beyond its header */
const HEADER_PADDING = 2;

type Cell =
  | { kind: 'missing' }
  | { kind: 'number'; text: string }
  | { kind: 'text'; text: string };

interface RenderedColumn {
  header: string;
  cells: string[];
  numeric: boolean;
}

/**
 * Round for display only, e.g. 1200.456 -> "1200.46", 1190 -> "1190"
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new DataProcessingError(`Failed to format table: cannot display ${value}`);
  }
  const rounded = Number(value.toFixed(2));
  return String(Object.is(rounded, -0) ? 0 : rounded);
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) {
    return { kind: 'missing' };
  }
  if (typeof value === 'number') {
    return { kind: 'number', text: formatNumber(value) };
  }
  if (typeof value === 'string') {
    return isNumericString(value)
      ? { kind: 'number', text: formatNumber(Number(value)) }
      : { kind: 'text', text: value };
  }
  if (typeof value === 'boolean') {
    return { kind: 'text', text: String(value) };
  }
  throw new DataProcessingError(`Failed to format table: unformattable value ${JSON.stringify(value) ?? typeof value}`);
}

/**
 * `start_time` as "YYYY-MM-DD HH:MM:SS" in the offset it was written in
 */
export function displayStartTime(row: TableRow): string | undefined {
  return row.startTime ? formatTimestamp(row.startTime, row.startTimeOffset) : undefined;
}

function columnValues(table: DataTable, column: string): unknown[] {
  return column === START_TIME_COLUMN ? table.rows.map(displayStartTime) : getColumnValues(table, column);
}

/**
 * Pad numeric cells so their decimal points line up
 */
function alignDecimals(cells: ReadonlyArray<Cell>): string[] {
  const parts = cells.map((cell) => {
    if (cell.kind === 'missing') {
      return undefined;
    }
    const dot = cell.text.indexOf('.');
    return dot === -1
      ? { whole: cell.text, fraction: '' }
      : { whole: cell.text.slice(0, dot), fraction: cell.text.slice(dot) };
  });
  const wholeWidth = Math.max(0, ...parts.map((p) => p?.whole.length ?? 0));
  const fractionWidth = Math.max(0, ...parts.map((p) => p?.fraction.length ?? 0));

  return parts.map((p) => (p ? p.whole.padStart(wholeWidth) + p.fraction.padEnd(fractionWidth) : ''));
}

function renderColumn(header: string, values: ReadonlyArray<unknown>): RenderedColumn {
  const cells = values.map(toCell);
  const present = cells.filter((cell) => cell.kind !== 'missing');
  const numeric = present.length > 0 && present.every((cell) => cell.kind === 'number');

  return {
    header,
    numeric,
    cells: numeric
      ? alignDecimals(cells)
      : cells.map((cell) => (cell.kind === 'missing' ? '' : cell.text)),
  };
}

function renderGrid(columns: ReadonlyArray<RenderedColumn>): string {
  const widths = columns.map((col) => Math.max(col.header.length + HEADER_PADDING, ...col.cells.map((c) => c.length)));
  const rule = (fill: string) => `+${widths.map((w) => fill.repeat(w + 2)).join('+')}+`;
  const line = (texts: ReadonlyArray<string>) =>
    `|${texts.map((text, i) => ` ${columns[i].numeric ? text.padStart(widths[i]) : text.padEnd(widths[i])} `).join('|')}|`;

  const rowCount = columns[0]?.cells.length ?? 0;
  const lines = [rule('-'), line(columns.map((col) => col.header)), rule('=')];
  for (let row = 0; row < rowCount; row++) {
    lines.push(line(columns.map((col) => col.cells[row])));
    lines.push(rule('-'));
  }
  return lines.join('\n');
}

/**
 * Format the first rows of a table as a bordered text grid for the console.
 * - Shows `start_time` (as "YYYY-MM-DD HH:MM:SS", wall-clock time as written) and `value`
 * - Numbers are rounded to 2 decimals for display only
 * - Appends "... (showing N of M rows)" when rows were cut off
 * @param table - Table to preview
 * @param maxRows - Row cap, a positive integer
 * @returns Grid text, or "No data available." for an empty table
 */
export function formatAsTable(table: DataTable, maxRows: number = DEFAULT_MAX_ROWS): string {
  if (!Number.isInteger(maxRows) || maxRows < 1) {
    throw new ValidationError(`max rows must be a positive integer, got ${maxRows}`);
  }
  if (table.rows.length === 0) {
    return NO_DATA_MESSAGE;
  }
  if (!hasColumn(table, VALUE_COLUMN)) {
    throw new DataProcessingError('Failed to format table: no value column');
  }

  const headers = hasColumn(table, START_TIME_COLUMN) ? [START_TIME_COLUMN, VALUE_COLUMN] : [VALUE_COLUMN];
  const preview: DataTable = { columns: table.columns, rows: table.rows.slice(0, maxRows) };

  let grid: string;
  try {
    grid = renderGrid(headers.map((header) => renderColumn(header, columnValues(preview, header))));
  } catch (error: unknown) {
    if (error instanceof DataProcessingError) {
      throw error;
    }
    throw new DataProcessingError(`Failed to format table: ${extractErrorMessage(error)}`, { cause: error });
  }

  if (table.rows.length > maxRows) {
    grid += `\n... (showing ${maxRows} of ${table.rows.length} rows)`;
  }
  return grid;
}
