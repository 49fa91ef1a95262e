/**
 * Logging utility with verbose mode support and value masking
 */

import chalk from 'chalk';

let verboseMode = false;

const MASK = '***';

// Values that must never reach the terminal verbatim
const maskedValues = new Set<string>();

/**
 * Register a value to be replaced by *** in everything the logger prints.
 * Very short values are ignored; masking them would shred ordinary output.
 */
export function maskValue(value: string): void {
  if (value.length < 4) return;
  maskedValues.add(value);
}

export function clearMaskedValues(): void {
  maskedValues.clear();
}

/**
 * Apply the registered masks to a message
 */
export function redact(message: string): string {
  let result = message;
  for (const value of maskedValues) {
    result = result.split(value).join(MASK);
  }
  return result;
}

export function setVerbose(enabled: boolean): void {
  verboseMode = enabled;
}

export function isVerbose(): boolean {
  return verboseMode;
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), redact(message));
}

export function success(message: string): void {
  console.log(chalk.green('✔'), redact(message));
}

export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), redact(message));
}

export function error(message: string): void {
  console.error(chalk.red('✖'), redact(message));
}

export function verbose(message: string): void {
  if (verboseMode) {
    console.log(chalk.gray('  →'), chalk.gray(redact(message)));
  }
}

export function header(message: string): void {
  console.log();
  console.log(chalk.bold.underline(message));
  console.log();
}

/**
 * Print a plain line (no prefix), still masked
 */
export function line(message: string): void {
  console.log(redact(message));
}

export function table(rows: string[][]): void {
  if (rows.length === 0) return;

  const colWidths = rows[0].map((_, colIndex) =>
    Math.max(...rows.map(row => redact(row[colIndex] || '').length))
  );

  const vertical = '│';

  const formatRow = (row: string[], isHeader = false): string => {
    const cells = row.map((cell, i) => ` ${redact(cell).padEnd(colWidths[i])} `);
    const rendered = vertical + cells.join(vertical) + vertical;
    return isHeader ? chalk.bold(rendered) : rendered;
  };

  const border = (left: string, middle: string, right: string): string => {
    const segments = colWidths.map(w => '─'.repeat(w + 2));
    return left + segments.join(middle) + right;
  };

  console.log(border('┌', '┬', '┐'));
  console.log(formatRow(rows[0], true));
  console.log(border('├', '┼', '┤'));

  for (let i = 1; i < rows.length; i++) {
    console.log(formatRow(rows[i]));
  }

  console.log(border('└', '┴', '┘'));
}

export function newline(): void {
  console.log();
}
