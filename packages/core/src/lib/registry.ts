/**
 * @file packages/core/src/lib/registry.ts
 * @description Name/alias lookup over the unit table plus the grouped listing used by
 *              `unitconv --list`.
 */

import { UNIT_CATEGORIES, UNIT_TABLE, type UnitCategory, type UnitDescriptor } from './units';

export interface CategoryGroup {
  category: UnitCategory;
  units: UnitDescriptor[];
}

export interface UnitRegistry {
  readonly units: readonly UnitDescriptor[];
  lookup: (input: string) => UnitDescriptor | null;
  listByCategory: () => CategoryGroup[];
}

/**
 * Lowercases ASCII letters only, so non-ASCII look-alikes (e.g. the Kelvin sign)
 * never fold onto a unit symbol.
 */
export const foldUnitName = (input: string): string =>
  input.replace(/[A-Z]/g, (letter) => letter.toLowerCase());

const keysOf = (unit: UnitDescriptor): string[] => [
  ...new Set([unit.name, ...unit.aliases].map(foldUnitName)),
];

export const findAliasCollisions = (units: readonly UnitDescriptor[]): string[] => {
  const owners = new Map<string, number>();
  units.forEach((unit) => {
    keysOf(unit).forEach((key) => owners.set(key, (owners.get(key) ?? 0) + 1));
  });
  return [...owners.entries()].filter(([, count]) => count > 1).map(([key]) => key);
};

export const createUnitRegistry = (units: readonly UnitDescriptor[]): UnitRegistry => {
  const collisions = findAliasCollisions(units);
  if (collisions.length) {
    throw new Error(`Unit names or aliases are claimed twice: ${collisions.join(', ')}`);
  }

  const table: readonly UnitDescriptor[] = Object.freeze([...units]);
  const index = new Map<string, UnitDescriptor>();
  table.forEach((unit) => {
    keysOf(unit).forEach((key) => index.set(key, unit));
  });

  return {
    units: table,
    lookup: (input) => index.get(foldUnitName(input)) ?? null,
    listByCategory: () =>
      UNIT_CATEGORIES.map((category) => ({
        category,
        units: table.filter((unit) => unit.category === category),
      })),
  };
};

export const unitRegistry = createUnitRegistry(UNIT_TABLE);

export const lookupUnit = (input: string): UnitDescriptor | null => unitRegistry.lookup(input);

export const listUnitsByCategory = (): CategoryGroup[] => unitRegistry.listByCategory();
