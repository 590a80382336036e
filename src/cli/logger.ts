/**
 * Terminal output for the CLI: colored status lines, spinners and count tables.
 */

import chalk from 'chalk';
import ora from 'ora';

/**
 * Print the CLI banner.
 */
export function printBanner(): void {
  console.log('');
  console.log(`  ${chalk.cyan.bold('skeleton-mapper')}`);
  console.log(`  ${chalk.gray('map SQL questions across schemas, keep the skeleton')}`);
  console.log('');
}

export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message, with an optional hint underneath.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(chalk.cyan.bold(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

export function newline(): void {
  console.log('');
}

function formatValue(key: string, value: unknown): string {
  if (typeof value !== 'number') return String(value);
  if (key.endsWith('_rate')) return `${(value * 100).toFixed(1)}%`;
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}

/**
 * Print one labelled value per line, e.g. a counts object.
 */
export function table(values: object): void {
  const entries: [string, unknown][] = Object.entries(values);
  const width = Math.max(0, ...entries.map(([key]) => key.length));
  for (const [key, value] of entries) {
    console.log(`  ${chalk.bold(key.padEnd(width))}  ${chalk.cyan(formatValue(key, value))}`);
  }
}
