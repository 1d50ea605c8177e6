/**
 * @file packages/cli/src/lib/render.ts
 * @description Text rendering for the unit listing, help extras and error diagnostics.
 */

import {
  ArgumentCountError,
  CategoryMismatchError,
  PROGRAM_NAME,
  UnknownUnitError,
  toErrorMessage,
  type CategoryGroup,
} from '@unitconv/core';
import type { CliLogger } from './logger';

export const USAGE = '<value> <from_unit> <to_unit>';

export const renderUnitList = (groups: CategoryGroup[]): string[] => {
  const lines = ['Supported units:', ''];
  groups.forEach(({ category, units }) => {
    lines.push(`${category}:`);
    units.forEach((unit) => {
      const aliases = unit.aliases.length ? `(${unit.aliases.join(', ')})` : '';
      lines.push(`  ${unit.name} ${aliases}`);
    });
    lines.push('');
  });
  return lines;
};

export const renderHelpFooter = (): string =>
  [
    '',
    'Examples:',
    `  ${PROGRAM_NAME} 5 km mi`,
    `  ${PROGRAM_NAME} 100 feet meters`,
    `  ${PROGRAM_NAME} 100 C F`,
    `  ${PROGRAM_NAME} 150 kg lb`,
    '',
    'Note: Unit names are case-insensitive and support common aliases',
  ].join('\n');

export interface ConversionInputs {
  from?: string;
  to?: string;
}

/**
 * Writes the diagnostic for a failed invocation: the error line, then any
 * context lines that help the user correct the input.
 */
export const reportError = (
  error: unknown,
  logger: CliLogger,
  inputs: ConversionInputs = {},
): void => {
  logger.error(`Error: ${toErrorMessage(error)}`);

  if (error instanceof ArgumentCountError) {
    logger.note(`Usage: ${PROGRAM_NAME} ${USAGE}`);
    logger.note(`Try '${PROGRAM_NAME} --help' for more information`);
  } else if (error instanceof UnknownUnitError) {
    logger.note(`Try '${PROGRAM_NAME} --list' to see supported units`);
  } else if (error instanceof CategoryMismatchError) {
    logger.note(`  ${inputs.from ?? '?'} is a ${error.fromCategory} unit`);
    logger.note(`  ${inputs.to ?? '?'} is a ${error.toCategory} unit`);
  }
};
