/**
 * Calculation reports
 * Every command builds a Report; the runner prints it as a table or JSON.
 */

import chalk from 'chalk';
import { renderKeyValues, renderTable, type TableColumn } from './table.js';

const SEPARATOR_WIDTH = 60;

export interface ReportTable {
  caption?: string;
  columns: TableColumn[];
  rows: string[][];
}

export interface Report {
  title: string;
  summary: Array<readonly [label: string, value: string]>;
  table?: ReportTable;
  notes?: string[];
  /** Raw values emitted by `--format json` */
  data: Record<string, unknown>;
}

export function renderReport(report: Report): string[] {
  const lines = ['', chalk.bold(report.title), chalk.bold('═'.repeat(SEPARATOR_WIDTH))];
  lines.push(...renderKeyValues(report.summary));

  if (report.table) {
    lines.push('');
    if (report.table.caption) {
      lines.push(chalk.bold(report.table.caption));
    }
    lines.push(...renderTable(report.table.columns, report.table.rows));
  }

  if (report.notes && report.notes.length > 0) {
    lines.push('');
    for (const note of report.notes) {
      lines.push(chalk.dim(note));
    }
  }

  return lines;
}

export function renderJson(report: Report): string {
  return JSON.stringify(report.data, null, 2);
}
