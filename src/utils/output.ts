/**
 * Output formatting utilities for consistent CLI output
 */

import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';

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
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
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

/**
 * Print the steps for publishing a release by hand
 */
export function manualReleaseInstructions(repository: string, tag: string): void {
  console.log(chalk.bold('\nTo publish the release manually:'));
  console.log(`  1. Open ${chalk.cyan(`https://github.com/${repository}/releases/new`)}`);
  console.log(`  2. Choose the tag ${chalk.cyan(tag)}`);
  console.log('  3. Fill in the title and notes, then publish');
  console.log(chalk.gray('  Or set GITHUB_TOKEN and run again.\n'));
}

/**
 * Ask a yes/no question on the terminal
 *
 * Resolves false on anything but y/yes, and when stdin is not a TTY.
 */
export async function confirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return false;
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${chalk.yellow('?')} ${question} ${chalk.gray('(y/N)')} `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}
