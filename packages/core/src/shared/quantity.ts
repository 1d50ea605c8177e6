/**
 * @file packages/core/src/shared/quantity.ts
 * @description Parsing of user-supplied quantities and their plain-decimal rendering.
 */

import { z } from 'zod';
import { NumberParseError } from './errors';

const QUANTITY_PATTERN = /^[+-]?(?:inf|infinity|nan|(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)$/i;

const toNumber = (raw: string): number => {
  const lower = raw.toLowerCase();
  const unsigned = lower.replace(/^[+-]/, '');
  if (unsigned === 'nan') return Number.NaN;
  if (unsigned === 'inf' || unsigned === 'infinity') {
    return lower.startsWith('-') ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return Number(raw);
};

export const QuantitySchema = z.string().regex(QUANTITY_PATTERN).transform(toNumber);

export const parseQuantity = (raw: string): number => {
  const parsed = QuantitySchema.safeParse(raw);
  if (!parsed.success) {
    throw new NumberParseError(raw);
  }
  return parsed.data;
};

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

const expandExponent = (text: string): string => {
  const match = EXPONENT_FORM.exec(text);
  if (!match) return text;

  const [, sign, lead, fraction = '', exponent] = match;
  const digits = `${lead}${fraction}`;
  const point = lead.length + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
};

/**
 * Shortest round-trip digits, never in exponent notation.
 */
export const formatQuantity = (value: number): string => {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Number.POSITIVE_INFINITY) return 'inf';
  if (value === Number.NEGATIVE_INFINITY) return '-inf';
  if (Object.is(value, -0)) return '-0';
  return expandExponent(String(value));
};
