/**
 * @file packages/core/src/lib/converter.ts
 * @description Two-step conversion through the category base unit, guarded by the
 *              category and physical-validity checks.
 */

import { BelowAbsoluteZeroError, CategoryMismatchError } from '../shared/errors';
import type { UnitDescriptor } from './units';

export interface ConversionWarning {
  code: 'negative-length';
  message: string;
}

export interface ConversionOutcome {
  value: number;
  warnings: ConversionWarning[];
}

const checkValidity = (value: number, from: UnitDescriptor): ConversionWarning[] => {
  switch (from.category) {
    case 'Length':
      return value < 0
        ? [{ code: 'negative-length', message: "Negative length doesn't make physical sense" }]
        : [];
    case 'Temperature':
      if (from.absoluteZero !== undefined && value < from.absoluteZero) {
        throw new BelowAbsoluteZeroError(from, value, from.absoluteZero);
      }
      return [];
    case 'Mass':
      // Negative mass passes through unchecked.
      return [];
  }
};

export const convert = (
  value: number,
  from: UnitDescriptor,
  to: UnitDescriptor,
): ConversionOutcome => {
  if (from.category !== to.category) {
    throw new CategoryMismatchError(from.category, to.category);
  }

  const warnings = checkValidity(value, from);
  const base = from.toBase(value);
  return { value: to.fromBase(base), warnings };
};
