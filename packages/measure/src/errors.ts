/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Error thrown when an argument is declared, supplied or read incorrectly */
export class MeasureArgumentError extends Error {
  constructor(
    message: string,
    public readonly argumentName: string,
  ) {
    super(message);
    this.name = 'MeasureArgumentError';
  }
}

/** Error thrown when a measure cannot be found or registered */
export class MeasureRegistryError extends Error {
  constructor(
    message: string,
    public readonly measureId: string,
  ) {
    super(message);
    this.name = 'MeasureRegistryError';
  }
}
