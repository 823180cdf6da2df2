import { formatAsTable } from '../logic/dataProcessing/tableFormatter';
import type { DataTable, StatsSummary } from '../logic/dataProcessing/types';

const RULE = '-'.repeat(50);

function formatStat(value: number | undefined): string {
  return value === undefined || Number.isNaN(value) ? 'N/A' : value.toFixed(2);
}

/**
 * Statistics block for the console
 * @returns Lines to print, empty when the summary has no fields
 */
export function formatStatsLines(stats: StatsSummary): string[] {
  if (Object.keys(stats).length === 0) {
    return [];
  }
  return [
    '📈 Statistics:',
    RULE,
    `Count:     ${stats.count ?? 'N/A'}`,
    `Average:   ${formatStat(stats.average)}`,
    `Maximum:   ${formatStat(stats.maximum)}`,
    `Minimum:   ${formatStat(stats.minimum)}`,
    `Median:    ${formatStat(stats.median)}`,
    `Std Dev:   ${formatStat(stats.stdDev)}`,
    RULE,
  ];
}

/**
 * Table preview followed by the statistics block
 */
export function renderResults(
  table: DataTable,
  stats: StatsSummary,
  variableId: string,
  maxRows?: number,
): string[] {
  if (table.rows.length === 0) {
    return ['No data available for the specified parameters.'];
  }

  const lines = ['', `📊 Data for Variable ${variableId}:`, RULE, formatAsTable(table, maxRows)];
  const statsLines = formatStatsLines(stats);
  if (statsLines.length > 0) {
    lines.push('', ...statsLines);
  }
  return lines;
}
