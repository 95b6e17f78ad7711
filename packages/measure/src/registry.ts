/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createLogger } from '@lcc-measures/model';
import { MeasureRegistryError } from './errors.js';
import type { ModelMeasure } from './measure.js';

const log = createLogger('MeasureRegistry');

/**
 * Measures known to the application, keyed by id
 */
export class MeasureRegistry {
  private measures: Map<string, ModelMeasure> = new Map();

  register(measure: ModelMeasure): void {
    const existing = this.measures.get(measure.id);
    if (existing === measure) return;
    if (existing) {
      throw new MeasureRegistryError(`A different measure is already registered as "${measure.id}"`, measure.id);
    }
    this.measures.set(measure.id, measure);
    log.info(`Registered measure "${measure.id}"`);
  }

  has(id: string): boolean {
    return this.measures.has(id);
  }

  get(id: string): ModelMeasure {
    const measure = this.measures.get(id);
    if (!measure) {
      const known = Array.from(this.measures.keys()).join(', ') || 'none';
      throw new MeasureRegistryError(`Unknown measure "${id}" (registered: ${known})`, id);
    }
    return measure;
  }

  list(): ModelMeasure[] {
    return Array.from(this.measures.values());
  }
}

/** Registry that measures join through registerWithApplication() */
export const measureRegistry = new MeasureRegistry();
