/**
 * Table Formatting Utility
 *
 * Box-drawn ASCII tables for `docr sources` and `docr query` output.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Alignment (default: left) */
  align?: Alignment;
  /** Longer cell values are cut and end with an ellipsis */
  maxWidth?: number;
}

export type Row = Record<string, string | number | null | undefined>;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(str: string): number {
  return str.replace(ANSI_PATTERN, '').length;
}

/**
 * Cut a plain string to `width` characters, marking the cut with '…'.
 */
export function truncateCell(value: string, width: number): string {
  if (value.length <= width) return value;
  if (width <= 1) return value.slice(0, width);
  return value.slice(0, width - 1) + '…';
}

function cellText(row: Row, column: Column): string {
  const raw = row[column.key];
  const text = raw == null ? '' : String(raw).replace(/\s+/g, ' ');
  return column.maxWidth !== undefined ? truncateCell(text, column.maxWidth) : text;
}

function pad(text: string, width: number, align: Alignment): string {
  const gap = width - visibleLength(text);
  if (gap <= 0) return text;
  return align === 'right' ? ' '.repeat(gap) + text : text + ' '.repeat(gap);
}

/**
 * Format rows as a table.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Source', key: 'id' }, { header: 'Words', key: 'words', align: 'right' }],
 *   [{ id: 'docs.example.com', words: 1200 }]
 * );
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((column) => cellText(row, column)));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map((line) => visibleLength(line[i] ?? '')))
  );

  const rule = (left: string, middle: string, right: string) =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (values: string[], header = false) =>
    '│' +
    columns
      .map((column, i) => {
        const padded = pad(values[i] ?? '', widths[i] ?? 0, column.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join('│') +
    '│';

  return [
    rule('┌', '┬', '┐'),
    line(
      columns.map((c) => c.header),
      true
    ),
    rule('├', '┼', '┤'),
    ...cells.map((values) => line(values)),
    rule('└', '┴', '┘'),
  ].join('\n');
}
