/**
 * Logging utility with verbose mode support
 */

import chalk from 'chalk';

let verboseMode = false;

export function setVerbose(enabled: boolean): void {
  verboseMode = enabled;
}

export function isVerbose(): boolean {
  return verboseMode;
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function success(message: string): void {
  console.log(chalk.green('✔'), message);
}

export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function error(message: string): void {
  console.error(chalk.red('✖'), message);
}

export function verbose(message: string): void {
  if (verboseMode) {
    console.log(chalk.gray('  →'), chalk.gray(message));
  }
}

export function header(message: string): void {
  console.log();
  console.log(chalk.bold.underline(message));
  console.log();
}

/**
 * Print an indented detail line under the previous message
 */
export function detail(message: string): void {
  console.log(`  ${message}`);
}

export function table(rows: string[][]): void {
  if (rows.length === 0) return;

  const colWidths = rows[0].map((_, colIndex) =>
    Math.max(...rows.map(row => (row[colIndex] || '').length))
  );

  const vertical = '│';

  const formatRow = (row: string[], isHeader = false): string => {
    const cells = colWidths.map((width, i) => ` ${(row[i] || '').padEnd(width)} `);
    const line = vertical + cells.join(vertical) + vertical;
    return isHeader ? chalk.bold(line) : line;
  };

  const border = (left: string, middle: string, right: string): string =>
    left + colWidths.map(w => '─'.repeat(w + 2)).join(middle) + right;

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
