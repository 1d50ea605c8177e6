/**
 * @file packages/core/src/shared/errors.ts
 * @description Error taxonomy for a single conversion request. Every error is terminal
 *              for the invocation that raised it.
 */

import type { UnitCategory, UnitDescriptor } from '../lib/units';

export type UnitConverterErrorCode =
  | 'argument-count'
  | 'number-parse'
  | 'unknown-unit'
  | 'category-mismatch'
  | 'below-absolute-zero';

export class UnitConverterError extends Error {
  public readonly code: UnitConverterErrorCode;

  public constructor(code: UnitConverterErrorCode, message: string) {
    super(message);
    this.name = 'UnitConverterError';
    this.code = code;
  }
}

export class ArgumentCountError extends UnitConverterError {
  public readonly expected: number;
  public readonly received: number;

  public constructor(expected: number, received: number) {
    super('argument-count', `Expected ${expected} arguments, got ${received}`);
    this.name = 'ArgumentCountError';
    this.expected = expected;
    this.received = received;
  }
}

export class NumberParseError extends UnitConverterError {
  public readonly input: string;

  public constructor(input: string) {
    super('number-parse', `'${input}' is not a valid number`);
    this.name = 'NumberParseError';
    this.input = input;
  }
}

/** Which side of the conversion failed to resolve. */
export type UnitSide = 'from' | 'to';

export class UnknownUnitError extends UnitConverterError {
  public readonly which: UnitSide;
  public readonly input: string;

  public constructor(which: UnitSide, input: string) {
    super('unknown-unit', `Unknown unit '${input}'`);
    this.name = 'UnknownUnitError';
    this.which = which;
    this.input = input;
  }
}

export class CategoryMismatchError extends UnitConverterError {
  public readonly fromCategory: UnitCategory;
  public readonly toCategory: UnitCategory;

  public constructor(fromCategory: UnitCategory, toCategory: UnitCategory) {
    super('category-mismatch', 'Cannot convert between different unit categories');
    this.name = 'CategoryMismatchError';
    this.fromCategory = fromCategory;
    this.toCategory = toCategory;
  }
}

export class BelowAbsoluteZeroError extends UnitConverterError {
  public readonly unit: string;
  public readonly value: number;
  public readonly absoluteZero: number;

  public constructor(unit: UnitDescriptor, value: number, absoluteZero: number) {
    super('below-absolute-zero', 'Temperature below absolute zero');
    this.name = 'BelowAbsoluteZeroError';
    this.unit = unit.name;
    this.value = value;
    this.absoluteZero = absoluteZero;
  }
}

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? 'Unknown error');
};
