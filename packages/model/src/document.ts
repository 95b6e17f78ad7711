/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Reading model documents (the JSON form of an InMemoryModel)
 */

import { ModelFormatError } from './errors.js';
import {
  COST_UNITS,
  LIFE_CYCLE_COST_CATEGORIES,
  type BuildingData,
  type CostUnits,
  type LifeCycleCostCategory,
  type LifeCycleCostData,
  type ModelDocument,
} from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new ModelFormatError('expected a string', `${path}.${key}`);
  }
  return value;
}

function readNumber(obj: Record<string, unknown>, key: string, path: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ModelFormatError('expected a finite number', `${path}.${key}`);
  }
  return value;
}

function isCategory(value: unknown): value is LifeCycleCostCategory {
  return LIFE_CYCLE_COST_CATEGORIES.some(category => category === value);
}

function isCostUnits(value: unknown): value is CostUnits {
  return COST_UNITS.some(units => units === value);
}

function parseBuilding(value: unknown): BuildingData {
  if (!isRecord(value)) {
    throw new ModelFormatError('expected an object', 'building');
  }
  return {
    handle: readString(value, 'handle', 'building'),
    name: readString(value, 'name', 'building'),
    floorArea: readNumber(value, 'floorArea', 'building'),
  };
}

function parseLifeCycleCost(value: unknown, path: string): LifeCycleCostData {
  if (!isRecord(value)) {
    throw new ModelFormatError('expected an object', path);
  }

  const category = value.category;
  if (!isCategory(category)) {
    throw new ModelFormatError(
      `expected one of ${LIFE_CYCLE_COST_CATEGORIES.join(', ')}`,
      `${path}.category`,
    );
  }
  const costUnits = value.costUnits;
  if (!isCostUnits(costUnits)) {
    throw new ModelFormatError(`expected one of ${COST_UNITS.join(', ')}`, `${path}.costUnits`);
  }

  return {
    handle: readString(value, 'handle', path),
    name: readString(value, 'name', path),
    itemHandle: readString(value, 'itemHandle', path),
    cost: readNumber(value, 'cost', path),
    costUnits,
    category,
    repeatPeriodYears: readNumber(value, 'repeatPeriodYears', path),
    yearsFromStart: readNumber(value, 'yearsFromStart', path),
  };
}

/**
 * Validate parsed JSON as a model document.
 *
 * @throws ModelFormatError naming the first offending path
 */
export function parseModelDocument(value: unknown): ModelDocument {
  if (!isRecord(value)) {
    throw new ModelFormatError('expected an object', '$');
  }

  const building = parseBuilding(value.building);

  const rawCosts = value.lifeCycleCosts ?? [];
  if (!Array.isArray(rawCosts)) {
    throw new ModelFormatError('expected an array', 'lifeCycleCosts');
  }
  const lifeCycleCosts = rawCosts.map((raw: unknown, i: number) => parseLifeCycleCost(raw, `lifeCycleCosts[${i}]`));

  return { building, lifeCycleCosts };
}
