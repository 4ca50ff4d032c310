/**
 * CLI helpers: error handling and option parsing.
 */

import chalk from 'chalk';
import { CorruptDataError } from '@tinytask/core';
import * as out from './output.js';

/** Report an error the way every command does */
export function reportError(err: unknown): void {
  if (err instanceof CorruptDataError) {
    out.error(err.message);
    out.info(chalk.dim(`Inspect or restore ${err.filePath} before running tinytask again. The file has not been modified.`));
    return;
  }
  if (err instanceof Error) {
    out.error(err.message);
    return;
  }
  out.error(String(err));
}

/**
 * Wrap a command action with error handling.
 * Errors are printed in full and the process exit code is set to 1.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    reportError(err);
    process.exitCode = 1;
  }
}

/** Commander collector for repeatable options (-t a -t b) */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Accepts "a,b" as well as separate values */
export function splitTags(values: readonly string[]): string[] {
  return values.flatMap(v => v.split(','));
}
