/**
 * @file packages/core/src/lib/units.ts
 * @description Static unit table. Each descriptor maps a quantity to its category's base
 *              unit (meters, Celsius, kilograms) and back.
 */

import { ABSOLUTE_ZERO, KELVIN_OFFSET } from '../shared/converter-config';

export const UNIT_CATEGORIES = ['Length', 'Temperature', 'Mass'] as const;

export type UnitCategory = (typeof UNIT_CATEGORIES)[number];

export const BASE_UNITS: Readonly<Record<UnitCategory, string>> = Object.freeze({
  Length: 'm',
  Temperature: 'C',
  Mass: 'kg',
});

export type Transform = (value: number) => number;

export interface UnitDescriptor {
  readonly name: string;
  readonly aliases: readonly string[];
  readonly category: UnitCategory;
  readonly toBase: Transform;
  readonly fromBase: Transform;
  /** Lowest valid value in this unit's own scale (temperature units only). */
  readonly absoluteZero?: number;
}

const identity: Transform = (value) => value;

const unit = (descriptor: UnitDescriptor): UnitDescriptor =>
  Object.freeze({ ...descriptor, aliases: Object.freeze([...descriptor.aliases]) });

const scaled = (
  name: string,
  aliases: string[],
  category: UnitCategory,
  factor: number,
): UnitDescriptor =>
  unit({
    name,
    aliases,
    category,
    toBase: (value) => value * factor,
    fromBase: (value) => value / factor,
  });

const base = (name: string, aliases: string[], category: UnitCategory): UnitDescriptor =>
  unit({ name, aliases, category, toBase: identity, fromBase: identity });

export const UNIT_TABLE: readonly UnitDescriptor[] = Object.freeze([
  scaled('km', ['kilometer', 'kilometers', 'kilometre', 'kilometres'], 'Length', 1000),
  base('m', ['meter', 'meters', 'metre', 'metres'], 'Length'),
  scaled('cm', ['centimeter', 'centimeters', 'centimetre', 'centimetres'], 'Length', 0.01),
  scaled('mm', ['millimeter', 'millimeters', 'millimetre', 'millimetres'], 'Length', 0.001),
  scaled('mi', ['mile', 'miles'], 'Length', 1609.344),
  scaled('yd', ['yard', 'yards'], 'Length', 0.9144),
  scaled('ft', ['foot', 'feet'], 'Length', 0.3048),
  scaled('in', ['inch', 'inches'], 'Length', 0.0254),
  unit({
    name: 'C',
    aliases: ['celsius', 'centigrade'],
    category: 'Temperature',
    toBase: identity,
    fromBase: identity,
    absoluteZero: ABSOLUTE_ZERO.C,
  }),
  unit({
    name: 'F',
    aliases: ['fahrenheit'],
    category: 'Temperature',
    toBase: (value) => ((value - 32) * 5) / 9,
    fromBase: (value) => (value * 9) / 5 + 32,
    absoluteZero: ABSOLUTE_ZERO.F,
  }),
  unit({
    name: 'K',
    aliases: ['kelvin'],
    category: 'Temperature',
    toBase: (value) => value - KELVIN_OFFSET,
    fromBase: (value) => value + KELVIN_OFFSET,
    absoluteZero: ABSOLUTE_ZERO.K,
  }),
  base('kg', ['kilogram', 'kilograms'], 'Mass'),
  scaled('g', ['gram', 'grams'], 'Mass', 0.001),
  scaled('mg', ['milligram', 'milligrams'], 'Mass', 0.000001),
  scaled('lb', ['pound', 'pounds'], 'Mass', 0.45359237),
  scaled('oz', ['ounce', 'ounces'], 'Mass', 0.028349523125),
  scaled('ton', ['tons', 'tonne', 'tonnes', 'metric ton'], 'Mass', 1000),
]);
