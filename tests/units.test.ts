/**
 * @file tests/units.test.ts
 * @description Checks the unit table: base units, round trips and frozen data.
 */

import { describe, expect, it } from 'vitest';
import { BASE_UNITS, UNIT_CATEGORIES, UNIT_TABLE } from '../packages/core/src/lib/units';

const samples = [-1000, -1.5, 0, 0.001, 42, 98.6, 1_000_000];

const expectApprox = (actual: number, expected: number, epsilon: number): void => {
  expect(Math.abs(actual - expected)).toBeLessThan(epsilon);
};

describe('UNIT_TABLE', () => {
  it('declares units in display order per category', () => {
    expect(UNIT_TABLE.map((unit) => unit.name)).toEqual([
      'km',
      'm',
      'cm',
      'mm',
      'mi',
      'yd',
      'ft',
      'in',
      'C',
      'F',
      'K',
      'kg',
      'g',
      'mg',
      'lb',
      'oz',
      'ton',
    ]);
  });

  it('routes every base unit through identity transforms', () => {
    UNIT_CATEGORIES.forEach((category) => {
      const base = UNIT_TABLE.find((unit) => unit.name === BASE_UNITS[category]);
      expect(base?.category).toBe(category);
      expect(base?.toBase(123.456)).toBe(123.456);
      expect(base?.fromBase(-7.25)).toBe(-7.25);
    });
  });

  it.each(UNIT_TABLE.map((unit) => ({ name: unit.name, unit })))(
    'round-trips values through the base unit for $name',
    ({ unit }) => {
      samples.forEach((value) => {
        const tolerance = 1e-9 * Math.max(1, Math.abs(value));
        expectApprox(unit.fromBase(unit.toBase(value)), value, tolerance);
      });
    },
  );

  it('carries absolute zero only on temperature units', () => {
    const floors = Object.fromEntries(
      UNIT_TABLE.filter((unit) => unit.absoluteZero !== undefined).map((unit) => [
        unit.name,
        unit.absoluteZero,
      ]),
    );
    expect(floors).toEqual({ C: -273.15, F: -459.67, K: 0 });
  });

  it('maps each temperature floor to the same base value', () => {
    UNIT_TABLE.filter((unit) => unit.category === 'Temperature').forEach((unit) => {
      expectApprox(unit.toBase(unit.absoluteZero ?? Number.NaN), -273.15, 1e-9);
    });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(UNIT_TABLE)).toBe(true);
    expect(Object.isFrozen(UNIT_TABLE[0])).toBe(true);
    expect(Object.isFrozen(UNIT_TABLE[0].aliases)).toBe(true);
  });
});
