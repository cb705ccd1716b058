/**
 * Table rendering
 * Pads by visual width so wide characters keep columns aligned
 */

import chalk from 'chalk';
import stringWidth from 'string-width';

export type Alignment = 'left' | 'right';

export interface TableColumn {
  header: string;
  align?: Alignment;
}

const COLUMN_GAP = '  ';

/**
 * Pad string to visual width
 */
export function padEndVisual(str: string, targetWidth: number): string {
  const currentWidth = stringWidth(str);
  if (currentWidth >= targetWidth) return str;
  return str + ' '.repeat(targetWidth - currentWidth);
}

export function padStartVisual(str: string, targetWidth: number): string {
  const currentWidth = stringWidth(str);
  if (currentWidth >= targetWidth) return str;
  return ' '.repeat(targetWidth - currentWidth) + str;
}

function alignCell(cell: string, width: number, align: Alignment, isLast: boolean): string {
  if (align === 'right') return padStartVisual(cell, width);
  return isLast ? cell : padEndVisual(cell, width);
}

/**
 * Render a table as lines: header, separator, then one line per row
 */
export function renderTable(columns: TableColumn[], rows: string[][]): string[] {
  const widths = columns.map((column, i) =>
    Math.max(stringWidth(column.header), ...rows.map((row) => stringWidth(row[i] ?? '')))
  );
  const lastIndex = columns.length - 1;

  const formatRow = (cells: string[], style: (text: string) => string = (text) => text): string =>
    columns
      .map((column, i) => style(alignCell(cells[i] ?? '', widths[i] ?? 0, column.align ?? 'left', i === lastIndex)))
      .join(COLUMN_GAP);

  const totalWidth = widths.reduce((sum, width) => sum + width, 0) + COLUMN_GAP.length * lastIndex;

  return [
    formatRow(
      columns.map((column) => column.header),
      (text) => chalk.bold.cyan(text)
    ),
    chalk.gray('─'.repeat(totalWidth)),
    ...rows.map((row) => formatRow(row)),
  ];
}

/**
 * Render label/value pairs with the values aligned
 */
export function renderKeyValues(pairs: ReadonlyArray<readonly [string, string]>, indent = 2): string[] {
  const labelWidth = Math.max(0, ...pairs.map(([label]) => stringWidth(label) + 1));
  const spaces = ' '.repeat(indent);
  return pairs.map(([label, value]) => `${spaces}${chalk.white(padEndVisual(`${label}:`, labelWidth))} ${value}`);
}
