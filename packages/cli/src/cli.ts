#!/usr/bin/env tsx
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for life cycle cost measures
 *
 * Usage:
 *   lcc-measure list
 *   lcc-measure describe add_cost_per_floor_area_to_building
 *   lcc-measure run add_cost_per_floor_area_to_building -m model.json \
 *     -a material_cost_ip=2.5 -a om_cost_ip=0.4 -o model.out.json
 *
 * Environment:
 *   LCC_DEBUG=true   Log runner messages and model mutations
 */

// Registers the bundled measures
import '@lcc-measures/add-cost-per-floor-area';
import { createProgram } from './program.js';

createProgram().parse();
