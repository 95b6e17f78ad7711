/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Model — the object handed to a measure's run().
 *
 * All model access goes through this object:
 *   const building = model.getBuilding()
 *   building.lifeCycleCosts()
 *   model.createLifeCycleCost({ name, item: building, cost, ... })
 */

import type {
  BuildingData,
  CostUnits,
  LifeCycleCostCategory,
  LifeCycleCostData,
  ModelBackend,
  ObjectHandle,
} from './types.js';

/**
 * Cost record proxy. Costed area and total cost are computed by the backend
 * on each call, so they follow later changes to the owner.
 */
export class LifeCycleCost {
  private _data: LifeCycleCostData;
  private backend: ModelBackend;

  constructor(data: LifeCycleCostData, backend: ModelBackend) {
    this._data = data;
    this.backend = backend;
  }

  get handle(): ObjectHandle { return this._data.handle; }
  get name(): string { return this._data.name; }
  get itemHandle(): ObjectHandle { return this._data.itemHandle; }
  get cost(): number { return this._data.cost; }
  get costUnits(): CostUnits { return this._data.costUnits; }
  get category(): LifeCycleCostCategory { return this._data.category; }
  get repeatPeriodYears(): number { return this._data.repeatPeriodYears; }
  get yearsFromStart(): number { return this._data.yearsFromStart; }

  /** Area in m² the cost is multiplied by, or null if the owner has no area */
  costedArea(): number | null {
    return this.backend.getCostedArea(this._data.itemHandle);
  }

  /** Cost of a single occurrence */
  totalCost(): number {
    switch (this._data.costUnits) {
      case 'CostPerArea':
        return this._data.cost * (this.costedArea() ?? 0);
      case 'CostPerEach':
        return this._data.cost;
    }
  }

  toJSON(): LifeCycleCostData {
    return { ...this._data };
  }
}

/** The building entity of a model */
export class Building {
  private _data: BuildingData;
  private backend: ModelBackend;

  constructor(data: BuildingData, backend: ModelBackend) {
    this._data = data;
    this.backend = backend;
  }

  get handle(): ObjectHandle { return this._data.handle; }
  get name(): string { return this._data.name; }
  get floorArea(): number { return this._data.floorArea; }

  /** Cost records currently attached to the building */
  lifeCycleCosts(): LifeCycleCost[] {
    return this.backend
      .getLifeCycleCosts(this._data.handle)
      .map(data => new LifeCycleCost(data, this.backend));
  }

  /** Remove all attached cost records, returning the removed ones */
  removeLifeCycleCosts(): LifeCycleCost[] {
    return this.backend
      .removeLifeCycleCosts(this._data.handle)
      .map(data => new LifeCycleCost(data, this.backend));
  }
}

export interface CreateLifeCycleCostOptions {
  name: string;
  /** Object the cost is attached to */
  item: Building;
  cost: number;
  costUnits: CostUnits;
  category: LifeCycleCostCategory;
  repeatPeriodYears: number;
  yearsFromStart: number;
}

export class Model {
  private backend: ModelBackend;

  constructor(backend: ModelBackend) {
    this.backend = backend;
  }

  getBuilding(): Building {
    return new Building(this.backend.getBuilding(), this.backend);
  }

  createLifeCycleCost(options: CreateLifeCycleCostOptions): LifeCycleCost {
    const data = this.backend.createLifeCycleCost({
      name: options.name,
      itemHandle: options.item.handle,
      cost: options.cost,
      costUnits: options.costUnits,
      category: options.category,
      repeatPeriodYears: options.repeatPeriodYears,
      yearsFromStart: options.yearsFromStart,
    });
    return new LifeCycleCost(data, this.backend);
  }

  /**
   * Run fn as a single group of mutations.
   * If fn throws, every mutation made inside it is discarded and the error rethrown.
   */
  batch<T>(label: string, fn: () => T): T {
    this.backend.batchBegin(label);
    let committed = false;
    try {
      const result = fn();
      committed = true;
      return result;
    } finally {
      this.backend.batchEnd(label, committed);
    }
  }
}

/** Wrap a backend in a Model */
export function createModel(backend: ModelBackend): Model {
  return new Model(backend);
}
