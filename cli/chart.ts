import { plot } from 'asciichart';
import { coerceValue } from '../logic/dataProcessing/statistics';
import { getColumnValues, hasColumn } from '../logic/dataProcessing/tableConverter';
import { displayStartTime } from '../logic/dataProcessing/tableFormatter';
import { VALUE_COLUMN, type DataTable } from '../logic/dataProcessing/types';

export const INSUFFICIENT_DATA_MESSAGE = 'Cannot plot: insufficient data.';

/** Widest series the console chart draws before sampling */
export const MAX_CHART_POINTS = 100;

const CHART_HEIGHT = 12;

/**
 * Pick at most `maxPoints` evenly spaced values, keeping first and last
 */
export function downsample(values: ReadonlyArray<number>, maxPoints: number = MAX_CHART_POINTS): number[] {
  if (values.length <= maxPoints) {
    return [...values];
  }
  const step = (values.length - 1) / (maxPoints - 1);
  return Array.from({ length: maxPoints }, (_, i) => values[Math.round(i * step)]);
}

export function chartTitle(variableId: string): string {
  return `Fingrid Variable ${variableId} - Electricity Data`;
}

/**
 * Console line chart of the value column
 * @returns Title, plot and time-range caption, or the insufficient-data notice
 */
export function renderChart(table: DataTable, variableId: string): string[] {
  if (table.rows.length === 0 || !hasColumn(table, VALUE_COLUMN)) {
    return [INSUFFICIENT_DATA_MESSAGE];
  }

  const values: number[] = [];
  getColumnValues(table, VALUE_COLUMN).forEach((cell, index) => {
    const value = coerceValue(cell, index);
    if (value !== undefined) {
      values.push(value);
    }
  });
  if (values.length === 0) {
    return [INSUFFICIENT_DATA_MESSAGE];
  }

  const chart = plot(downsample(values), {
    height: CHART_HEIGHT,
    format: (x: number) => x.toFixed(2).padStart(10),
  });

  const times = table.rows.flatMap((row) => displayStartTime(row) ?? []);
  const caption = times.length > 0
    ? `Time: ${times[0]} -> ${times[times.length - 1]}`
    : `Samples: ${values.length}`;

  return [chartTitle(variableId), '', chart, '', caption];
}
