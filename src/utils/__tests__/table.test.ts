/**
 * Tests for table formatting utility
 */

import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatTable, truncateCell, type Column, type Row } from '../table.js';

describe('formatTable', () => {
  it('returns empty string when no columns', () => {
    expect(formatTable([], [])).toBe('');
  });

  it('renders borders, header and one line per row', () => {
    const columns: Column[] = [
      { header: 'Name', key: 'name' },
      { header: 'N', key: 'n', align: 'right' },
    ];
    const rows: Row[] = [
      { name: 'ab', n: 5 },
      { name: 'abcdef', n: 120 },
    ];

    const lines = formatTable(columns, rows).split('\n');

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('┌────────┬─────┐');
    expect(lines[2]).toBe('├────────┼─────┤');
    expect(lines[3]).toBe('│ ab     │   5 │');
    expect(lines[4]).toBe('│ abcdef │ 120 │');
    expect(lines[5]).toBe('└────────┴─────┘');
  });

  it('renders only headers when there are no rows', () => {
    const lines = formatTable([{ header: 'Source', key: 'id' }], []).split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[1]).toContain('Source');
  });

  it('prints null and undefined as empty cells', () => {
    const lines = formatTable(
      [
        { header: 'A', key: 'a' },
        { header: 'B', key: 'b' },
      ],
      [{ a: null, b: undefined }]
    ).split('\n');

    expect(lines[3]).toBe('│   │   │');
  });

  it('ignores ANSI codes when measuring widths', () => {
    const lines = formatTable([{ header: 'Status', key: 's' }], [{ s: chalk.green('ok') }]).split(
      '\n'
    );

    expect(lines[0]).toBe('┌────────┐');
  });

  it('truncates and flattens long cells to maxWidth', () => {
    const lines = formatTable(
      [{ header: 'Summary', key: 's', maxWidth: 8 }],
      [{ s: 'first line\nsecond line' }]
    ).split('\n');

    expect(lines[3]).toBe('│ first l… │');
  });
});

describe('truncateCell', () => {
  it('keeps short values unchanged', () => {
    expect(truncateCell('abc', 3)).toBe('abc');
  });

  it('ends cut values with an ellipsis', () => {
    expect(truncateCell('abcdef', 4)).toBe('abc…');
  });
});
