/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ObjectHandle } from './types.js';

/** Error thrown when the model rejects a mutation */
export class ModelError extends Error {
  constructor(
    message: string,
    public readonly handle?: ObjectHandle,
  ) {
    super(message);
    this.name = 'ModelError';
  }
}

/** Error thrown when a model document cannot be read */
export class ModelFormatError extends Error {
  constructor(
    message: string,
    /** JSON path of the offending value, e.g. "lifeCycleCosts[2].cost" */
    public readonly path: string,
  ) {
    super(`${path}: ${message}`);
    this.name = 'ModelFormatError';
  }
}
