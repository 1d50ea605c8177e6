#!/usr/bin/env node
/**
 * @file packages/cli/src/cli.ts
 * @description Bootstraps the unitconv CLI, which converts a value between units of
 *              length, temperature and mass.
 *
 * @example
 *   unitconv 5 km mi
 *   unitconv 100 feet meters
 *   unitconv -40 C F
 *   unitconv --list
 */

import chalk from 'chalk';
import { toErrorMessage } from '@unitconv/core';
import { runCli } from './program';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red(`[fatal] ${toErrorMessage(error)}`));
    process.exitCode = 1;
  });
