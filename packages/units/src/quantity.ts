/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createUnit, sameDimensions, type Unit } from './unit.js';

/** Error thrown when a value cannot be converted between two units */
export class UnitConversionError extends Error {
  constructor(
    message: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(message);
    this.name = 'UnitConversionError';
  }
}

/**
 * A value paired with its unit
 */
export class Quantity {
  constructor(
    readonly value: number,
    readonly unit: Unit,
  ) {}

  toString(): string {
    return `${this.value} ${this.unit.text}`;
  }
}

/**
 * Convert a quantity to another unit.
 *
 * @returns the converted quantity, or null when the units measure different things
 */
export function convert(quantity: Quantity, target: Unit): Quantity | null {
  if (!sameDimensions(quantity.unit, target)) {
    return null;
  }
  return new Quantity(quantity.value * quantity.unit.scale / target.scale, target);
}

/**
 * Convert a bare value between two units given as text.
 *
 * Usage:
 *   convertValue(2.0, '1/ft^2', '1/m^2')  // 21.5278...
 *   convertValue(1000, 'm^2', 'ft^2')     // 10763.91...
 *
 * @throws UnitConversionError if either unit is unknown or the dimensions differ
 */
export function convertValue(value: number, from: string, to: string): number {
  const fromUnit = createUnit(from);
  if (!fromUnit) {
    throw new UnitConversionError(`Unknown unit "${from}"`, from, to);
  }
  const toUnit = createUnit(to);
  if (!toUnit) {
    throw new UnitConversionError(`Unknown unit "${to}"`, from, to);
  }

  const converted = convert(new Quantity(value, fromUnit), toUnit);
  if (!converted) {
    throw new UnitConversionError(`Cannot convert from ${from} to ${to}`, from, to);
  }
  return converted.value;
}
