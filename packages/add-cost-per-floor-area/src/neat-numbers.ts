/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Decimal places kept by neatNumbers */
export type RoundTo = 0 | 2;

/** Round half away from zero, so -2.5 becomes -3 like 2.5 becomes 3 */
function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.sign(value) * Math.round(Math.abs(value));
  return rounded === 0 ? 0 : rounded;
}

/** toFixed(2) without the exponent notation it falls back to from 1e21 up */
function fixedTwoDecimals(value: number): string {
  return Math.abs(value) < 1e21 ? value.toFixed(2) : `${BigInt(value).toString()}.00`;
}

/**
 * Format a number for report messages, with commas between thousands.
 *
 *   neatNumbers(4125001.25641)     // "4,125,001.26"
 *   neatNumbers(4125001.25641, 0)  // "4,125,001"
 *   neatNumbers(-1500, 0)          // "-1,500"
 */
export function neatNumbers(value: number, roundTo: RoundTo = 2): string {
  if (!Number.isFinite(value)) return String(value);

  const text = roundTo === 2 ? fixedTwoDecimals(value) : BigInt(roundHalfAwayFromZero(value)).toString();

  const sign = text.startsWith('-') ? '-' : '';
  const unsigned = sign ? text.slice(1) : text;
  const dotIdx = unsigned.indexOf('.');
  const integerPart = dotIdx === -1 ? unsigned : unsigned.slice(0, dotIdx);
  const fraction = dotIdx === -1 ? '' : unsigned.slice(dotIdx);

  return `${sign}${integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}${fraction}`;
}
