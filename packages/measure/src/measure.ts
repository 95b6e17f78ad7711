/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Model } from '@lcc-measures/model';
import type { MeasureArgument, UserArguments } from './arguments.js';
import type { MeasureRunner } from './runner.js';
import { measureRegistry, type MeasureRegistry } from './registry.js';

/**
 * Base class of measures that modify a building model.
 *
 * Subclasses call `super.run()` first and stop if it returns false:
 *
 *   run(model, runner, userArguments) {
 *     if (!super.run(model, runner, userArguments)) return false;
 *     ...
 *   }
 */
export abstract class ModelMeasure {
  /** Stable identifier used to look the measure up (e.g. on the command line) */
  abstract readonly id: string;

  /** Name shown to the user */
  abstract name(): string;

  abstract description(): string;

  /** How the measure changes the model, for modelers */
  abstract modelerDescription(): string;

  abstract arguments(model: Model): MeasureArgument[];

  run(model: Model, runner: MeasureRunner, userArguments: UserArguments): boolean {
    return runner.validateUserArguments(this.arguments(model), userArguments);
  }

  /** Make the measure discoverable by the application */
  registerWithApplication(registry: MeasureRegistry = measureRegistry): void {
    registry.register(this);
  }
}
