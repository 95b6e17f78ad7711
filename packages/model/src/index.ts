/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lcc-measures/model - Building model contract for measures
 *
 * ```ts
 * import { InMemoryModel, createModel } from '@lcc-measures/model';
 *
 * const model = createModel(new InMemoryModel({ building: { floorArea: 1000 } }));
 * const building = model.getBuilding();
 * model.createLifeCycleCost({
 *   name: 'Roof', item: building, cost: 12, costUnits: 'CostPerArea',
 *   category: 'Construction', repeatPeriodYears: 25, yearsFromStart: 0,
 * });
 * building.lifeCycleCosts()[0].totalCost(); // 12000
 * ```
 */

export * from './types.js';
export { Model, Building, LifeCycleCost, createModel, type CreateLifeCycleCostOptions } from './model.js';
export { InMemoryModel, type InMemoryModelOptions } from './in-memory-model.js';
export { parseModelDocument } from './document.js';
export { ModelError, ModelFormatError } from './errors.js';
export { createLogger, type Logger, type LogContext } from './logger.js';
