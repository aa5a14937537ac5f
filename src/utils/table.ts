/**
 * Box-drawn text tables for the `indexes` and `search --trace` output.
 */

import chalk from 'chalk';

/**
 * One table column, reading its cell from a row.
 */
export interface Column<T> {
  header: string;
  value: (row: T) => string | number | undefined;
  /** @default 'left' */
  align?: 'left' | 'right';
  /** Cells wider than this are cut and end with an ellipsis */
  maxWidth?: number;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

/** Printed width, ignoring colour codes */
function visibleWidth(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function clip(text: string, maxWidth: number | undefined): string {
  if (maxWidth === undefined || visibleWidth(text) <= maxWidth) {
    return text;
  }
  return `${text.slice(0, Math.max(maxWidth - 1, 0))}…`;
}

function pad(text: string, width: number, align: 'left' | 'right'): string {
  const fill = ' '.repeat(Math.max(width - visibleWidth(text), 0));
  return align === 'right' ? fill + text : text + fill;
}

/**
 * Render rows as a table with a bold header.
 *
 * @example
 * ```ts
 * formatTable(
 *   [
 *     { header: 'Index', value: (i: IndexDescriptor) => i.name },
 *     { header: 'Kind', value: (i: IndexDescriptor) => i.kind, align: 'right' },
 *   ],
 *   indexes
 * );
 * // ┌──────────────┬─────────┐
 * // │ Index        │    Kind │
 * // ├──────────────┼─────────┤
 * // │ records_fts  │    text │
 * // │ category_idx │ keyword │
 * // └──────────────┴─────────┘
 * ```
 */
export function formatTable<T>(columns: readonly Column<T>[], rows: readonly T[]): string {
  if (columns.length === 0) {
    return '';
  }

  const body = rows.map((row) =>
    columns.map((column) => {
      const value = column.value(row);
      return clip(value === undefined ? '' : String(value), column.maxWidth);
    })
  );
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...body.map((cells) => visibleWidth(cells[i] ?? '')))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (cells: string[], header = false): string => {
    const rendered = cells.map((cell, i) => {
      const padded = pad(cell, widths[i] ?? 0, columns[i]?.align ?? 'left');
      return ` ${header ? chalk.bold(padded) : padded} `;
    });
    return `│${rendered.join('│')}│`;
  };

  return [
    rule('┌', '┬', '┐'),
    line(
      columns.map((column) => column.header),
      true
    ),
    rule('├', '┼', '┤'),
    ...body.map((cells) => line(cells)),
    rule('└', '┴', '┘'),
  ].join('\n');
}
