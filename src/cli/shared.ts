import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { HassLinkError, HttpError } from '../utils/errors.js';

export interface ServerOption {
  server?: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`'${value}' is not a positive integer`);
  }
  return parsed;
}

/**
 * Print a failed command's error and set a non-zero exit code
 */
export function reportError(error: unknown): void {
  if (error instanceof HttpError) {
    console.error(chalk.red(`✗ HTTP ${error.status}: ${error.body || error.statusText}`));
  } else if (error instanceof HassLinkError) {
    console.error(chalk.red(`✗ ${error.message}`));
  } else {
    console.error(chalk.red(`✗ Error: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exitCode = 1;
}

export function checkMark(ok: boolean): string {
  return ok ? chalk.green('✓') : chalk.red('✗');
}
