/**
 * @file packages/cli/src/program.ts
 * @description Commander wiring for `unitconv`. Conversion logic lives in
 *              `@unitconv/core` (`runConvertWorkflow`); this module only maps argv to it
 *              and results back to the terminal.
 */

import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import figlet from 'figlet';
import {
  ArgumentCountError,
  PROGRAM_NAME,
  VERSION_BANNER,
  listUnitsByCategory,
  runConvertWorkflow,
} from '@unitconv/core';
import { createConsoleLogger, type CliLogger } from './lib/logger';
import { USAGE, renderHelpFooter, renderUnitList, reportError } from './lib/render';

type ProgramOptions = {
  list?: boolean;
};

const EXPECTED_ARGUMENTS = 3;

const stripNewline = (text: string): string => text.replace(/\n$/, '');

/** Flags honored only when given as the sole argument. */
const INFORMATIONAL_FLAGS = new Set(['-h', '--help', '-v', '--version', '-l', '--list']);

const renderBanner = (): string =>
  [chalk.hex('#9be2ff')(figlet.textSync(PROGRAM_NAME, { font: 'Standard' })), VERSION_BANNER].join(
    '\n',
  );

/**
 * Anything other than a lone informational flag is passed after `--`, so every
 * token (including "-40", "-l" or a literal "--") counts as a positional argument.
 */
export const toProgramArgs = (args: string[]): string[] =>
  args.length === 1 && INFORMATIONAL_FLAGS.has(args[0]) ? args : ['--', ...args];

export const buildProgram = (logger: CliLogger, setExitCode: (code: number) => void): Command =>
  new Command(PROGRAM_NAME)
    .description('Convert values between units of length, temperature and mass')
    .usage(USAGE)
    .argument('[args...]', 'value, from_unit and to_unit')
    .version(VERSION_BANNER, '-v, --version', 'Show version information')
    .helpOption('-h, --help', 'Show this help message')
    .option('-l, --list', 'List all supported units')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => logger.log(stripNewline(text)),
      writeErr: (text) => logger.error(stripNewline(text)),
    })
    .addHelpText('beforeAll', renderBanner)
    .addHelpText('after', renderHelpFooter())
    .action((args: string[] = [], options: ProgramOptions) => {
      if (options.list) {
        renderUnitList(listUnitsByCategory()).forEach((line) => logger.log(line));
        return;
      }

      try {
        if (args.length !== EXPECTED_ARGUMENTS) {
          throw new ArgumentCountError(EXPECTED_ARGUMENTS, args.length);
        }
        const [value, from, to] = args;
        const result = runConvertWorkflow({ value, from, to });
        result.warnings.forEach((warning) => logger.warn(`Warning: ${warning.message}`));
        logger.log(result.summary);
      } catch (error) {
        reportError(error, logger, { from: args[1], to: args[2] });
        setExitCode(1);
      }
    });

/**
 * Runs the CLI against user arguments (argv without the node binary and script)
 * and resolves to the process exit code.
 */
export const runCli = async (
  args: string[],
  logger: CliLogger = createConsoleLogger(),
): Promise<number> => {
  let exitCode = 0;
  const program = buildProgram(logger, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(toProgramArgs(args), { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
};
