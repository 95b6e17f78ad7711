/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Core types for @lcc-measures/model
 *
 * These types describe the part of a host building model that measures may
 * read and mutate. Measures only see the backend through the Model proxies.
 */

// ============================================================================
// Handles
// ============================================================================

/** Opaque identifier of a model object, assigned by the backend */
export type ObjectHandle = string;

// ============================================================================
// Life Cycle Costs
// ============================================================================

export const LIFE_CYCLE_COST_CATEGORIES = [
  'Construction',
  'Maintenance',
  'Repair',
  'Operation',
  'Replacement',
  'MinorOverhaul',
  'MajorOverhaul',
  'OtherOperational',
  'Salvage',
] as const;

/** Classification used to group cost records for aggregation */
export type LifeCycleCostCategory = typeof LIFE_CYCLE_COST_CATEGORIES[number];

export const COST_UNITS = ['CostPerEach', 'CostPerArea'] as const;

/** How the cost value is multiplied out to a total */
export type CostUnits = typeof COST_UNITS[number];

/** Serializable cost record, as stored by a backend */
export interface LifeCycleCostData {
  handle: ObjectHandle;
  name: string;
  /** Handle of the object the cost is attached to */
  itemHandle: ObjectHandle;
  /** Currency per costing unit (per m² for CostPerArea) */
  cost: number;
  costUnits: CostUnits;
  category: LifeCycleCostCategory;
  /** Years between recurrences */
  repeatPeriodYears: number;
  /** Years from the start of the analysis until the first occurrence */
  yearsFromStart: number;
}

/** Input for creating a cost record; the backend assigns the handle */
export type LifeCycleCostSpec = Omit<LifeCycleCostData, 'handle'>;

// ============================================================================
// Building
// ============================================================================

export interface BuildingData {
  handle: ObjectHandle;
  name: string;
  /** Conditioned floor area in m², the costed area of per-area records */
  floorArea: number;
}

// ============================================================================
// Backend Interface (implemented by a host adapter or InMemoryModel)
// ============================================================================

/** Abstraction over the host's model graph — the Model proxies use this */
export interface ModelBackend {
  getBuilding(): BuildingData;

  getLifeCycleCosts(owner: ObjectHandle): LifeCycleCostData[];
  createLifeCycleCost(spec: LifeCycleCostSpec): LifeCycleCostData;
  /** Remove every cost record attached to the owner and return what was removed */
  removeLifeCycleCosts(owner: ObjectHandle): LifeCycleCostData[];
  /** Area in m² that per-area costs on this owner are multiplied by, or null if it has none */
  getCostedArea(owner: ObjectHandle): number | null;

  /** Start grouping mutations under a label */
  batchBegin(label: string): void;
  /** Close the group opened with the same label; discard its mutations unless commit is true */
  batchEnd(label: string, commit: boolean): void;
}

// ============================================================================
// Model document (JSON persistence used by the CLI)
// ============================================================================

export interface ModelDocument {
  building: BuildingData;
  lifeCycleCosts: LifeCycleCostData[];
}
