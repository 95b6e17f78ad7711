/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Unit parsing for measure inputs and reports
 *
 * Units are written the way measure arguments declare them:
 *   'ft^2', 'm^2', '1/ft^2', '$/ft^2', 'ft*ft'
 *
 * A parsed unit carries its dimension exponents and the factor that converts
 * a value in this unit to the SI base (meters, currency).
 */

/** Exponents of the base dimensions a unit is built from */
export interface Dimensions {
  length: number;
  currency: number;
}

export interface Unit {
  /** Normalized source text (whitespace removed) */
  readonly text: string;
  readonly dimensions: Dimensions;
  /** Multiplier from this unit to SI: valueSI = value * scale */
  readonly scale: number;
}

/**
 * Length symbols and their size in meters
 */
const LENGTH_UNIT_FACTORS: Record<string, number> = {
  'm': 1,
  'mm': 0.001,
  'cm': 0.01,
  'km': 1000,
  'ft': 0.3048,
  'in': 0.0254,
  'yd': 0.9144,
  'mi': 1609.344,
};

const CURRENCY_SYMBOLS = new Set(['$']);

const FACTOR_PATTERN = /^([A-Za-z$]+)(?:\^(-?\d+))?$/;

function emptyDimensions(): Dimensions {
  return { length: 0, currency: 0 };
}

/**
 * Parse one side of a quotient ("ft^2", "$*m", "1") into dimensions and scale.
 * Returns null when any factor is unknown.
 */
function parseProduct(text: string, sign: 1 | -1): { dimensions: Dimensions; scale: number } | null {
  const dimensions = emptyDimensions();
  let scale = 1;

  for (const factor of text.split('*')) {
    if (factor === '1') continue;

    const match = FACTOR_PATTERN.exec(factor);
    if (!match) return null;

    const symbol = match[1] ?? '';
    const exponent = (match[2] !== undefined ? Number(match[2]) : 1) * sign;

    const lengthFactor = LENGTH_UNIT_FACTORS[symbol];
    if (lengthFactor !== undefined) {
      dimensions.length += exponent;
      scale *= Math.pow(lengthFactor, exponent);
    } else if (CURRENCY_SYMBOLS.has(symbol)) {
      dimensions.currency += exponent;
    } else {
      return null;
    }
  }

  return { dimensions, scale };
}

/**
 * Create a unit from its text form.
 *
 * @returns the unit, or null if the text is not a recognised unit expression
 */
export function createUnit(text: string): Unit | null {
  const normalized = text.replace(/\s+/g, '');
  if (!normalized) return null;

  const parts = normalized.split('/');
  if (parts.length > 2) return null;

  const [numeratorText = '', denominatorText] = parts;
  if (!numeratorText) return null;

  const numerator = parseProduct(numeratorText, 1);
  if (!numerator) return null;

  if (denominatorText === undefined) {
    return { text: normalized, dimensions: numerator.dimensions, scale: numerator.scale };
  }

  if (!denominatorText) return null;
  const denominator = parseProduct(denominatorText, -1);
  if (!denominator) return null;

  return {
    text: normalized,
    dimensions: {
      length: numerator.dimensions.length + denominator.dimensions.length,
      currency: numerator.dimensions.currency + denominator.dimensions.currency,
    },
    scale: numerator.scale * denominator.scale,
  };
}

/** True when two units measure the same kind of quantity */
export function sameDimensions(a: Unit, b: Unit): boolean {
  return a.dimensions.length === b.dimensions.length
    && a.dimensions.currency === b.dimensions.currency;
}
