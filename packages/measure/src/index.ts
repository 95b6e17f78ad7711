/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lcc-measures/measure - Measure framework
 *
 * ```ts
 * import { applyMeasure, measureRegistry } from '@lcc-measures/measure';
 *
 * const measure = measureRegistry.get('add_cost_per_floor_area_to_building');
 * const result = applyMeasure(measure, model, { material_cost_ip: 2.5 });
 * result.outcome; // 'Success' | 'Fail' | 'NA'
 * ```
 */

export {
  MeasureArgument,
  parseArgumentValue,
  parseArgumentAssignments,
  type ArgumentType,
  type ArgumentValue,
  type ArgumentManifest,
  type UserArguments,
} from './arguments.js';
export { MeasureRunner, type MeasureOutcome, type MeasureResult } from './runner.js';
export { ModelMeasure } from './measure.js';
export { MeasureRegistry, measureRegistry } from './registry.js';
export { applyMeasure, describeMeasure, type MeasureManifest } from './apply.js';
export { MeasureArgumentError, MeasureRegistryError } from './errors.js';
