/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Add Cost per Floor Area to Building
 *
 * Attaches material/installation, demolition and O&M life cycle costs to the
 * building, priced per floor area, and optionally removes the costs already
 * attached to it. Intended as an always-run measure on the baseline so the
 * baseline carries its full cost without costing individual objects.
 */

import type { Model } from '@lcc-measures/model';
import { ModelMeasure, MeasureArgument, type MeasureRunner, type UserArguments } from '@lcc-measures/measure';
import { convertValue } from '@lcc-measures/units';
import { neatNumbers } from './neat-numbers.js';

export const DEFAULT_LCC_NAME = 'Building - Life Cycle Costs';

/** Longest expected life accepted, in years */
export const MAX_EXPECTED_LIFE = 100;

/** Arguments after validation, in the measure's own terms */
export interface CostParameters {
  removeCosts: boolean;
  lccName: string;
  /** $/ft² */
  materialCostIp: number;
  /** $/ft² */
  demolitionCostIp: number;
  yearsUntilCostsStart: number;
  demoCostInitialConst: boolean;
  expectedLife: number;
  /** $/ft² */
  omCostIp: number;
  omFrequency: number;
}

/**
 * Check the timing arguments.
 *
 * @returns the error to report, or null when they are usable
 */
export function checkLifecycleParameters(params: Pick<CostParameters, 'yearsUntilCostsStart' | 'expectedLife' | 'omFrequency'>): string | null {
  const { yearsUntilCostsStart, expectedLife, omFrequency } = params;
  if (yearsUntilCostsStart < 0 || yearsUntilCostsStart > expectedLife) {
    return 'Years until costs start should be a non-negative integer less than Expected Life.';
  }
  if (expectedLife < 1 || expectedLife > MAX_EXPECTED_LIFE) {
    return 'Choose an integer greater than 0 and less than or equal to 100 for Expected Life.';
  }
  if (omFrequency < 1) {
    return 'Choose an integer greater than 0 for O & M Frequency.';
  }
  return null;
}

/** Year of the first demolition cost */
export function demolitionYearsFromStart(params: Pick<CostParameters, 'yearsUntilCostsStart' | 'demoCostInitialConst' | 'expectedLife'>): number {
  return params.demoCostInitialConst
    ? params.yearsUntilCostsStart
    : params.yearsUntilCostsStart + params.expectedLife;
}

export class AddCostPerFloorAreaToBuilding extends ModelMeasure {
  readonly id = 'add_cost_per_floor_area_to_building';

  name(): string {
    return 'Add Cost per Floor Area to Building';
  }

  description(): string {
    return 'This measure will create life cycle cost objects associated with the building. You can set a material and installation cost, demolition cost, and O&M costs. Optionally existing cost objects already associated with the building can be deleted. This measure will not affect energy use of the building.';
  }

  modelerDescription(): string {
    return [
      "In addition to the inputs for the cost values, a number of other inputs are exposed to specify when the cost first occurs and at what frequency it occurs in the future. This measure is intended to be used as an 'Always Run' measure to apply costs to the baseline simulation before any design alternatives manipulate it. This will allow you to show the full cost for your baseline building without having to manually cost all individual objects. You could include construction costs, land, design fees, or anything else you want.",
      '',
      "For baseline costs, 'Years Until Costs Start' indicates the year that the capital costs first occur. For new construction this will typically be 0 and 'Demolition Costs Occur During Initial Construction' will be 'false'. For a retrofit 'Years Until Costs Start' is between 0 and the 'Expected Life' of the object, while 'Demolition Costs Occur During Initial Construction' is true. O&M cost and frequency can be whatever is appropriate for the component.",
    ].join('\n');
  }

  arguments(_model: Model): MeasureArgument[] {
    return [
      MeasureArgument.makeBoolArgument('remove_costs', true)
        .setDisplayName('Remove Existing Costs')
        .setDefaultValue(true),
      MeasureArgument.makeStringArgument('lcc_name', true)
        .setDisplayName('Name for Life Cycle Cost Object')
        .setDefaultValue(DEFAULT_LCC_NAME),
      MeasureArgument.makeDoubleArgument('material_cost_ip', true)
        .setDisplayName('Material and Installation Costs for Construction per Area Used')
        .setUnits('$/ft^2')
        .setDefaultValue(0.0),
      MeasureArgument.makeDoubleArgument('demolition_cost_ip', true)
        .setDisplayName('Demolition Costs for Construction per Area Used')
        .setUnits('$/ft^2')
        .setDefaultValue(0.0),
      MeasureArgument.makeIntegerArgument('years_until_costs_start', true)
        .setDisplayName('Years Until Costs Start')
        .setUnits('whole years')
        .setDefaultValue(0),
      MeasureArgument.makeBoolArgument('demo_cost_initial_const', true)
        .setDisplayName('Demolition Costs Occur During Initial Construction')
        .setDefaultValue(false),
      MeasureArgument.makeIntegerArgument('expected_life', true)
        .setDisplayName('Expected Life')
        .setUnits('whole years')
        .setDefaultValue(20),
      MeasureArgument.makeDoubleArgument('om_cost_ip', true)
        .setDisplayName('O & M Costs for Construction per Area Used')
        .setUnits('$/ft^2')
        .setDefaultValue(0.0),
      MeasureArgument.makeIntegerArgument('om_frequency', true)
        .setDisplayName('O & M Frequency')
        .setUnits('whole years')
        .setDefaultValue(1),
    ];
  }

  run(model: Model, runner: MeasureRunner, userArguments: UserArguments): boolean {
    if (!super.run(model, runner, userArguments)) {
      return false;
    }

    const params: CostParameters = {
      removeCosts: runner.getBoolArgumentValue('remove_costs', userArguments),
      lccName: runner.getStringArgumentValue('lcc_name', userArguments),
      materialCostIp: runner.getDoubleArgumentValue('material_cost_ip', userArguments),
      demolitionCostIp: runner.getDoubleArgumentValue('demolition_cost_ip', userArguments),
      yearsUntilCostsStart: runner.getIntegerArgumentValue('years_until_costs_start', userArguments),
      demoCostInitialConst: runner.getBoolArgumentValue('demo_cost_initial_const', userArguments),
      expectedLife: runner.getIntegerArgumentValue('expected_life', userArguments),
      omCostIp: runner.getDoubleArgumentValue('om_cost_ip', userArguments),
      omFrequency: runner.getIntegerArgumentValue('om_frequency', userArguments),
    };

    const building = model.getBuilding();

    // Demolition alone does not create costs
    let costsRequested = false;
    if (Math.abs(params.materialCostIp) + Math.abs(params.omCostIp) === 0) {
      runner.registerInfo('No costs were requested for the building.');
    } else {
      costsRequested = true;
    }

    const lifecycleError = checkLifecycleParameters(params);
    if (lifecycleError) {
      runner.registerError(lifecycleError);
      return false;
    }

    const existing = building.lifeCycleCosts();
    runner.registerInitialCondition(`The Building has ${existing.length} lifecycle cost objects.`);

    let costsRemoved = false;
    if (existing.length > 0 && params.removeCosts) {
      runner.registerInfo('Removing existing lifecycle cost objects associated with the building.');
      costsRemoved = building.removeLifeCycleCosts().length > 0;
    }

    if (!costsRequested && !costsRemoved) {
      runner.registerAsNotApplicable('No new lifecycle costs objects were requested, and no costs were deleted.');
    }

    if (costsRequested) {
      const materialCostSi = convertValue(params.materialCostIp, '1/ft^2', '1/m^2');
      const demolitionCostSi = convertValue(params.demolitionCostIp, '1/ft^2', '1/m^2');
      const omCostSi = convertValue(params.omCostIp, '1/ft^2', '1/m^2');

      model.batch('Add life cycle costs', () => {
        model.createLifeCycleCost({
          name: `LCC_Mat - ${params.lccName}`,
          item: building,
          cost: materialCostSi,
          costUnits: 'CostPerArea',
          category: 'Construction',
          repeatPeriodYears: params.expectedLife,
          yearsFromStart: params.yearsUntilCostsStart,
        });
        model.createLifeCycleCost({
          name: `LCC_Demo - ${params.lccName}`,
          item: building,
          cost: demolitionCostSi,
          costUnits: 'CostPerArea',
          category: 'Salvage',
          repeatPeriodYears: params.expectedLife,
          yearsFromStart: demolitionYearsFromStart(params),
        });
        model.createLifeCycleCost({
          name: `LCC_OM - ${params.lccName}`,
          item: building,
          cost: omCostSi,
          costUnits: 'CostPerArea',
          category: 'Maintenance',
          repeatPeriodYears: params.omFrequency,
          yearsFromStart: 0,
        });
      });
    }

    const buildingCosts = building.lifeCycleCosts();
    const totalMaterialCost = buildingCosts
      .filter(cost => cost.category === 'Construction')
      .reduce((sum, cost) => sum + cost.totalCost(), 0);

    const [firstCost] = buildingCosts;
    if (firstCost) {
      const costedAreaSi = firstCost.costedArea();
      if (costedAreaSi === null) {
        runner.registerWarning('The building has no costed area; reporting an area of 0.');
      }
      const costedAreaIp = convertValue(costedAreaSi ?? 0, 'm^2', 'ft^2');
      runner.registerFinalCondition(
        `A new lifecycle cost object was added to the building. The building has an area of ${neatNumbers(costedAreaIp, 0)} (ft^2). Material and Installation costs are $${neatNumbers(totalMaterialCost, 0)}.`,
      );
    } else {
      runner.registerFinalCondition('There are no lifecycle cost objects associated with the building.');
    }

    return true;
  }
}
