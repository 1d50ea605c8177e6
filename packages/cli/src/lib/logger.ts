/**
 * @file packages/cli/src/lib/logger.ts
 * @description Terminal logger for the CLI. Plain messages in, colored output out.
 */

import chalk from 'chalk';

export interface CliLogger {
  /** Result lines, stdout. */
  log: (message: string) => void;
  note: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export const createConsoleLogger = (): CliLogger => ({
  log: (message) => console.log(message),
  note: (message) => console.error(chalk.gray(message)),
  warn: (message) => console.error(chalk.yellow(message)),
  error: (message) => console.error(chalk.red(message)),
});
