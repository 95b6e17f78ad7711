/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Model } from '@lcc-measures/model';
import type { ArgumentManifest, UserArguments } from './arguments.js';
import type { ModelMeasure } from './measure.js';
import { MeasureRunner, type MeasureResult } from './runner.js';

/** Serializable description of a measure, its metadata and arguments */
export interface MeasureManifest {
  id: string;
  className: string;
  name: string;
  description: string;
  modelerDescription: string;
  arguments: ArgumentManifest[];
}

export function describeMeasure(measure: ModelMeasure, model: Model): MeasureManifest {
  return {
    id: measure.id,
    className: measure.constructor.name,
    name: measure.name(),
    description: measure.description(),
    modelerDescription: measure.modelerDescription(),
    arguments: measure.arguments(model).map(arg => arg.toJSON()),
  };
}

/**
 * Run one measure against a model.
 *
 * A run that returns false is reported as Fail even if it registered no error.
 * Errors thrown by the model propagate to the caller.
 */
export function applyMeasure(
  measure: ModelMeasure,
  model: Model,
  userArguments: UserArguments,
  runner: MeasureRunner = new MeasureRunner(),
): MeasureResult {
  const ok = measure.run(model, runner, userArguments);
  const result = runner.result();
  return ok ? result : { ...result, outcome: 'Fail' };
}
