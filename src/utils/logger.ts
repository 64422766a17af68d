/**
 * Console logging for the unpublish CLI
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export type LogDetails = Record<string, unknown>;

let verboseMode = false;

export function setVerbose(verbose: boolean): void {
  verboseMode = verbose;
}

const PREFIXES: Record<LogLevel, string> = {
  debug: chalk.gray('[DEBUG]'),
  info: chalk.blue('[INFO]'),
  warn: chalk.yellow('[WARN]'),
  error: chalk.red('[ERROR]'),
  success: chalk.green('[OK]'),
};

function formatMessage(level: LogLevel, message: string, details?: LogDetails): string {
  let output = `${PREFIXES[level]} ${message}`;

  if (verboseMode) {
    output = `${chalk.gray(new Date().toISOString())} ${output}`;
  }

  if (details && Object.keys(details).length > 0) {
    const detailStr = Object.entries(details)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(' ');
    output += ` ${chalk.gray(detailStr)}`;
  }

  return output;
}

export function debug(message: string, details?: LogDetails): void {
  if (verboseMode) {
    console.log(formatMessage('debug', message, details));
  }
}

export function info(message: string, details?: LogDetails): void {
  console.log(formatMessage('info', message, details));
}

export function warn(message: string, details?: LogDetails): void {
  console.warn(formatMessage('warn', message, details));
}

export function error(message: string, details?: LogDetails): void {
  console.error(formatMessage('error', message, details));
}

export function success(message: string, details?: LogDetails): void {
  console.log(formatMessage('success', message, details));
}

export function section(title: string): void {
  console.log();
  console.log(chalk.bold.cyan(`=== ${title} ===`));
}

export function subsection(title: string): void {
  console.log(chalk.cyan(`--- ${title} ---`));
}

export function listItem(item: string, indent = 0): void {
  const indentStr = '  '.repeat(indent);
  console.log(`${indentStr}${chalk.gray('•')} ${item}`);
}

export function keyValue(key: string, value: string | number | boolean | undefined, indent = 0): void {
  const indentStr = '  '.repeat(indent);
  const displayValue = value === undefined ? chalk.gray('(not set)') : String(value);
  console.log(`${indentStr}${chalk.gray(key + ':')} ${displayValue}`);
}

/**
 * Print rows as a fixed-width table
 */
export function table(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxDataWidth = Math.max(0, ...rows.map(row => (row[i] ?? '').length));
    return Math.max(h.length, maxDataWidth);
  });

  console.log(chalk.bold(headers.map((h, i) => h.padEnd(widths[i])).join(' | ')));
  console.log(widths.map(w => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    console.log(row.map((cell, i) => (cell ?? '').padEnd(widths[i])).join(' | '));
  }
}

/**
 * Redraw a single-line progress bar. `current` is clamped into [0, total].
 */
export function progress(current: number, total: number, label: string): void {
  const bounded = Math.min(Math.max(current, 0), total);
  const percent = total > 0 ? Math.round((bounded / total) * 100) : 100;
  const filled = Math.floor(percent / 5);
  const bar = '█'.repeat(filled) + '░'.repeat(20 - filled);
  process.stdout.write(`\r${chalk.gray('[')}${chalk.cyan(bar)}${chalk.gray(']')} ${percent}% ${label}`);

  if (bounded === total) {
    console.log();
  }
}

export const logger = {
  debug,
  info,
  warn,
  error,
  success,
  section,
  subsection,
  listItem,
  keyValue,
  table,
  progress,
  setVerbose,
};
