/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @lcc-measures/add-cost-per-floor-area
 *
 * Importing this package registers the measure with the shared measure registry.
 */

import { AddCostPerFloorAreaToBuilding } from './measure.js';

export {
  AddCostPerFloorAreaToBuilding,
  checkLifecycleParameters,
  demolitionYearsFromStart,
  DEFAULT_LCC_NAME,
  MAX_EXPECTED_LIFE,
  type CostParameters,
} from './measure.js';
export { neatNumbers, type RoundTo } from './neat-numbers.js';

export const addCostPerFloorAreaToBuilding = new AddCostPerFloorAreaToBuilding();

addCostPerFloorAreaToBuilding.registerWithApplication();
