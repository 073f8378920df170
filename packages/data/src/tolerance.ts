/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Numeric tolerances and length units
 */

/** Comparison epsilon for values that are zero by construction */
export const EPS = 1e-9;

export function isAlmostZero(value: number, eps = EPS): boolean {
  return Math.abs(value) <= eps;
}

export type LengthUnit = 'ft' | 'in' | 'm' | 'cm' | 'mm';

export const LENGTH_UNITS: readonly LengthUnit[] = ['ft', 'in', 'm', 'cm', 'mm'];

/** Centimetres per unit */
const CENTIMETRES_PER_UNIT: Record<LengthUnit, number> = {
  ft: 12 * 2.54,
  in: 2.54,
  m: 100,
  cm: 1,
  mm: 0.1,
};

export function isLengthUnit(value: string): value is LengthUnit {
  return (LENGTH_UNITS as readonly string[]).includes(value);
}

/** How far an element may overflow into the next level before it is split there */
export const LEVEL_EXTENSION_CM = 10;

/**
 * Level extension expressed in the given model unit.
 * Feet (the default model unit) gives 10 / (12 * 2.54).
 */
export function levelExtensionFor(unit: LengthUnit = 'ft'): number {
  return LEVEL_EXTENSION_CM / CENTIMETRES_PER_UNIT[unit];
}
