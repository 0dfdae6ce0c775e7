import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ConfigFile, type CliOverrides } from '../config/config-file.js';
import type { RunOptions } from '../config/schema.js';
import { ExitCode } from '../core/orchestrator.js';
import { ConfigurationError, toErrorMessage } from '../core/errors.js';

/** Options every run command takes. */
export interface CommonOptions {
  config?: string;
  root?: string;
  kind?: 'standard' | 'github';
}

export function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export function resolveRunOptions(configPath: string | undefined, flags: CliOverrides): RunOptions {
  return new ConfigFile(configPath).toRunOptions(flags);
}

/** Print a fatal error and exit; configuration problems get no stack. */
export function exitWithError(err: unknown): never {
  if (err instanceof ConfigurationError) {
    console.error(chalk.red(err.message));
  } else {
    console.error(chalk.red(`Unexpected error: ${toErrorMessage(err)}`));
    if (err instanceof Error && err.stack && process.env.DEBUG) console.error(chalk.dim(err.stack));
  }
  process.exit(ExitCode.failure);
}
