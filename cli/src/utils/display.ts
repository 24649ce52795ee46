/**
 * Display helpers shared by the formatters
 */

import chalk from 'chalk';

export const StatusSymbols = {
  started: '▶',
  running: '●',
  success: '✔',
  failure: '✖',
  warning: '⚠',
  retry: '↻',
  pause: '⏸',
  info: 'ℹ',
} as const;

/**
 * "850ms", "2.50s", "1m 5s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function divider(width: number = 60, char: string = '─'): string {
  return char.repeat(width);
}

/**
 * Painter honouring a no-colour setting
 */
export function createPainter(colors: boolean): chalk.Chalk {
  return colors ? new chalk.Instance() : new chalk.Instance({ level: 0 });
}

/**
 * Value rendered on one line: strings as is, everything else as JSON
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

export interface SummaryRow {
  label: string;
  value: string | number;
}

/**
 * Aligned `label: value` lines
 */
export function formatSummary(rows: readonly SummaryRow[], indent: string = '  '): string[] {
  const width = Math.max(0, ...rows.map(row => row.label.length));
  return rows.map(row => `${indent}${`${row.label}:`.padEnd(width + 2)}${row.value}`);
}
