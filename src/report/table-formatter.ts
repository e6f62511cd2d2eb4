import { DEFAULT_TABLE_DIGITS } from '../library/constants.js';

export type TableCell = string | number | boolean | null | undefined;
export type TableRow = Record<string, TableCell>;

export interface FormatTableOptions {
  caption?: string;
  digits?: number;
}

function formatCell(value: TableCell, digits: number): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(digits)));
  }
  return String(value).replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Render rows as a markdown pipe table. Columns appear in first-seen order;
 * all-numeric columns are right-aligned.
 */
export function formatTable(rows: TableRow[], options: FormatTableOptions = {}): string {
  const { caption, digits = DEFAULT_TABLE_DIGITS } = options;
  if (rows.length === 0) return '*No data available*';

  const columns = [...new Set(rows.flatMap((row) => Object.keys(row)))];
  const numeric = columns.map((column) =>
    rows.every((row) => typeof row[column] === 'number')
  );

  const lines = [
    `| ${columns.join(' | ')} |`,
    `| ${numeric.map((isNumeric) => (isNumeric ? '---:' : '---')).join(' | ')} |`,
    ...rows.map((row) => `| ${columns.map((column) => formatCell(row[column], digits)).join(' | ')} |`),
  ];
  const table = lines.join('\n');

  return caption ? `**${caption}**\n\n${table}` : table;
}

/**
 * Two-column Metric/Value table from a flat record.
 */
export function formatSummaryRecord(record: Record<string, string | number>, title?: string): string {
  const rows = Object.entries(record).map(([Metric, Value]) => ({ Metric, Value }));
  return formatTable(rows, { caption: title });
}
