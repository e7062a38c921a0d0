/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ObservedState, ServiceStatus } from '../reconcilers/pro/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  // Human-readable format
  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print observed attachment and service statuses
 */
export function printObservedState(observed: ObservedState): void {
  console.log(`  ${chalk.gray('Attached:')} ${observed.attached ? chalk.green('yes') : chalk.yellow('no')}`);

  const services = Object.entries(observed.services);
  if (services.length === 0) {
    return;
  }

  console.log(chalk.bold('\nServices:\n'));
  const width = Math.max(...services.map(([name]) => name.length));
  for (const [name, status] of services) {
    console.log(`  ${name.padEnd(width)}  ${statusColor(status)(status)}`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

function statusColor(status: ServiceStatus): typeof chalk.green {
  switch (status) {
    case 'enabled':
      return chalk.green;
    case 'disabled':
      return chalk.white;
    case 'not-applicable':
      return chalk.gray;
    case 'not-entitled':
      return chalk.yellow;
  }
}
