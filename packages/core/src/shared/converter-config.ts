/**
 * @file packages/core/src/shared/converter-config.ts
 * @description Centralized constants for the converter: program identity and the
 *              per-unit temperature floors used by the validity check.
 */

import pkg from '../../package.json';

export const PROGRAM_NAME = 'unitconv';

export const CONVERTER_VERSION: string = pkg.version;

export const VERSION_BANNER = `Unit Converter v${CONVERTER_VERSION}`;

/**
 * Absolute zero expressed in each temperature unit's own scale.
 * Values equal to the floor are valid.
 */
export const ABSOLUTE_ZERO = {
  C: -273.15,
  F: -459.67,
  K: 0,
} as const;

export const KELVIN_OFFSET = 273.15;
