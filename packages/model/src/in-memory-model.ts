/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * InMemoryModel — a self-contained ModelBackend.
 *
 * Used by the CLI (loaded from a model document) and by tests. Holds one
 * building and the cost records attached to it. Batches snapshot the record
 * table so an aborted batch can be rolled back.
 */

import { createLogger } from './logger.js';
import { ModelError } from './errors.js';
import { parseModelDocument } from './document.js';
import {
  COST_UNITS,
  LIFE_CYCLE_COST_CATEGORIES,
  type BuildingData,
  type LifeCycleCostData,
  type LifeCycleCostSpec,
  type ModelBackend,
  type ModelDocument,
  type ObjectHandle,
} from './types.js';

const log = createLogger('InMemoryModel');

interface BatchFrame {
  label: string;
  costs: Map<ObjectHandle, LifeCycleCostData>;
  nextId: number;
}

export interface InMemoryModelOptions {
  building?: Partial<BuildingData>;
  lifeCycleCosts?: LifeCycleCostData[];
}

export class InMemoryModel implements ModelBackend {
  private building: BuildingData;
  private costs: Map<ObjectHandle, LifeCycleCostData> = new Map();
  private batches: BatchFrame[] = [];
  private nextId = 1;

  constructor(options: InMemoryModelOptions = {}) {
    this.building = {
      handle: options.building?.handle ?? 'building-1',
      name: options.building?.name ?? 'Building 1',
      floorArea: options.building?.floorArea ?? 0,
    };
    if (!Number.isFinite(this.building.floorArea) || this.building.floorArea < 0) {
      throw new ModelError('Building floor area must be a non-negative number', this.building.handle);
    }

    for (const cost of options.lifeCycleCosts ?? []) {
      if (this.costs.has(cost.handle)) {
        throw new ModelError(`Duplicate life cycle cost handle ${cost.handle}`, cost.handle);
      }
      this.validateSpec(cost);
      this.costs.set(cost.handle, { ...cost });
    }
  }

  /** Build a model from parsed JSON */
  static fromDocument(value: unknown): InMemoryModel {
    const doc = parseModelDocument(value);
    return new InMemoryModel({ building: doc.building, lifeCycleCosts: doc.lifeCycleCosts });
  }

  toDocument(): ModelDocument {
    return {
      building: { ...this.building },
      lifeCycleCosts: Array.from(this.costs.values(), cost => ({ ...cost })),
    };
  }

  getBuilding(): BuildingData {
    return { ...this.building };
  }

  getLifeCycleCosts(owner: ObjectHandle): LifeCycleCostData[] {
    const result: LifeCycleCostData[] = [];
    for (const cost of this.costs.values()) {
      if (cost.itemHandle === owner) {
        result.push({ ...cost });
      }
    }
    return result;
  }

  createLifeCycleCost(spec: LifeCycleCostSpec): LifeCycleCostData {
    this.validateSpec(spec);

    const data: LifeCycleCostData = {
      ...spec,
      handle: this.allocateHandle(),
      name: this.uniqueName(spec.name),
    };
    this.costs.set(data.handle, data);

    log.debug('Created life cycle cost', data, { operation: 'createLifeCycleCost', handle: data.handle });
    return { ...data };
  }

  removeLifeCycleCosts(owner: ObjectHandle): LifeCycleCostData[] {
    const removed = this.getLifeCycleCosts(owner);
    for (const cost of removed) {
      this.costs.delete(cost.handle);
    }

    log.debug(`Removed ${removed.length} life cycle costs`, undefined, { operation: 'removeLifeCycleCosts', handle: owner });
    return removed;
  }

  getCostedArea(owner: ObjectHandle): number | null {
    return owner === this.building.handle ? this.building.floorArea : null;
  }

  batchBegin(label: string): void {
    this.batches.push({ label, costs: new Map(this.costs), nextId: this.nextId });
  }

  batchEnd(label: string, commit: boolean): void {
    const frame = this.batches.pop();
    if (!frame || frame.label !== label) {
      throw new ModelError(`Batch "${label}" was not the innermost open batch`);
    }
    if (!commit) {
      this.costs = frame.costs;
      this.nextId = frame.nextId;
      log.info(`Rolled back batch "${label}"`, { operation: 'batchEnd' });
    }
  }

  private validateSpec(spec: LifeCycleCostSpec): void {
    if (spec.itemHandle !== this.building.handle) {
      throw new ModelError(`No model object with handle ${spec.itemHandle}`, spec.itemHandle);
    }
    if (!Number.isFinite(spec.cost)) {
      throw new ModelError(`Cost of "${spec.name}" must be a finite number`, spec.itemHandle);
    }
    if (!COST_UNITS.includes(spec.costUnits)) {
      throw new ModelError(`Unsupported cost units "${spec.costUnits}"`, spec.itemHandle);
    }
    if (!LIFE_CYCLE_COST_CATEGORIES.includes(spec.category)) {
      throw new ModelError(`Unsupported category "${spec.category}"`, spec.itemHandle);
    }
    if (!Number.isInteger(spec.repeatPeriodYears) || spec.repeatPeriodYears < 0) {
      throw new ModelError(`Repeat period of "${spec.name}" must be a whole number of years`, spec.itemHandle);
    }
    if (!Number.isInteger(spec.yearsFromStart) || spec.yearsFromStart < 0) {
      throw new ModelError(`Years from start of "${spec.name}" must be a non-negative whole number`, spec.itemHandle);
    }
  }

  private allocateHandle(): ObjectHandle {
    let handle = `lcc-${this.nextId++}`;
    while (this.costs.has(handle)) {
      handle = `lcc-${this.nextId++}`;
    }
    return handle;
  }

  /** Names are unique within the model; clashes get a numeric suffix */
  private uniqueName(name: string): string {
    const taken = new Set(Array.from(this.costs.values(), cost => cost.name));
    if (!taken.has(name)) return name;
    let suffix = 1;
    while (taken.has(`${name} ${suffix}`)) {
      suffix++;
    }
    return `${name} ${suffix}`;
  }
}
