/**
 * Table Formatters
 *
 * Fixed-width text tables for list-style command output.
 *
 * @module cli/formatters/table
 */

import chalk from 'chalk';

/**
 * One table column.
 */
export interface TableColumn {
  header: string;
  width: number;
  /** Right-align the cell (numbers) */
  alignRight?: boolean;
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Visible length of a string, ignoring ANSI color codes.
 */
export function visibleLength(str: string): number {
  return str.replace(/\x1b\[[0-9;]*m/g, '').length;
}

/**
 * Pad a string to a fixed width.
 */
export function padRight(str: string, width: number): string {
  return str + ' '.repeat(Math.max(0, width - visibleLength(str)));
}

/**
 * Pad a string on the left to a fixed width.
 */
export function padLeft(str: string, width: number): string {
  return ' '.repeat(Math.max(0, width - visibleLength(str))) + str;
}

function formatCell(value: string, column: TableColumn): string {
  const cell = truncate(value, column.width);
  return column.alignRight ? padLeft(cell, column.width) : padRight(cell, column.width);
}

/**
 * Render a header, divider and one line per row. Columns are separated by
 * two spaces and trailing whitespace is trimmed.
 */
export function formatTable(columns: readonly TableColumn[], rows: readonly (readonly string[])[]): string[] {
  const render = (cells: readonly string[]) =>
    columns
      .map((column, i) => formatCell(cells[i] ?? '', column))
      .join('  ')
      .trimEnd();

  const totalWidth = columns.reduce((sum, column) => sum + column.width, 0) + 2 * (columns.length - 1);

  return [
    chalk.bold(render(columns.map((column) => column.header))),
    chalk.dim('-'.repeat(totalWidth)),
    ...rows.map(render),
  ];
}
