/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, beforeEach } from 'vitest';
import { AddCostPerFloorAreaToBuilding } from '@lcc-measures/add-cost-per-floor-area';
import { MeasureRegistry } from '@lcc-measures/measure';
import { parseModelDocument, type ModelDocument } from '@lcc-measures/model';
import { createProgram, formatResult, type CliIO } from './index.js';

const MEASURE_ID = 'add_cost_per_floor_area_to_building';

interface FakeState {
  files: Map<string, string>;
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

/** In-memory CliIO that records output */
function createFakeIO(files: Record<string, string> = {}): { io: CliIO; state: FakeState } {
  const state: FakeState = {
    files: new Map(Object.entries(files)),
    stdout: [],
    stderr: [],
    exitCode: 0,
  };
  const io: CliIO = {
    readFile(path) {
      const content = state.files.get(path);
      if (content === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
      return content;
    },
    writeFile(path, content) {
      state.files.set(path, content);
    },
    stdout: line => { state.stdout.push(line); },
    stderr: line => { state.stderr.push(line); },
    setExitCode: code => { state.exitCode = code; },
  };
  return { io, state };
}

const modelDocument: ModelDocument = {
  building: { handle: 'bldg', name: 'Office', floorArea: 1000 },
  lifeCycleCosts: [{
    handle: 'old-1',
    name: 'Old Construction',
    itemHandle: 'bldg',
    cost: 5,
    costUnits: 'CostPerArea',
    category: 'Construction',
    repeatPeriodYears: 20,
    yearsFromStart: 0,
  }],
};

describe('lcc-measure', () => {
  let registry: MeasureRegistry;

  beforeEach(() => {
    registry = new MeasureRegistry();
    registry.register(new AddCostPerFloorAreaToBuilding());
  });

  it('lists registered measures', () => {
    const { io, state } = createFakeIO();
    createProgram(io, registry).parse(['list'], { from: 'user' });

    expect(state.stdout).toEqual([`${MEASURE_ID}\tAdd Cost per Floor Area to Building`]);
  });

  it('describes a measure as JSON', () => {
    const { io, state } = createFakeIO();
    createProgram(io, registry).parse(['describe', MEASURE_ID], { from: 'user' });

    const manifest = JSON.parse(state.stdout.join('\n'));
    expect(manifest.id).toBe(MEASURE_ID);
    expect(manifest.className).toBe('AddCostPerFloorAreaToBuilding');
    expect(manifest.arguments).toHaveLength(9);
  });

  it('runs a measure and writes the resulting model', () => {
    const { io, state } = createFakeIO({ 'model.json': JSON.stringify(modelDocument) });

    createProgram(io, registry).parse([
      'run', MEASURE_ID,
      '-m', 'model.json',
      '-a', 'material_cost_ip=2.0',
      '--arg', 'om_cost_ip=0.5',
      '-o', 'out.json',
    ], { from: 'user' });

    expect(state.stdout).toEqual([
      'Add Cost per Floor Area to Building: Success',
      'Initial condition: The Building has 1 lifecycle cost objects.',
      'Info: Removing existing lifecycle cost objects associated with the building.',
      'Final condition: A new lifecycle cost object was added to the building. The building has an area of 10,764 (ft^2). Material and Installation costs are $21,528.',
      'Wrote model to out.json',
    ]);
    expect(state.exitCode).toBe(0);

    const written = parseModelDocument(JSON.parse(state.files.get('out.json') ?? 'null'));
    expect(written.building).toEqual(modelDocument.building);
    expect(written.lifeCycleCosts.map(c => [c.name, c.category, c.itemHandle])).toEqual([
      ['LCC_Mat - Building - Life Cycle Costs', 'Construction', 'bldg'],
      ['LCC_Demo - Building - Life Cycle Costs', 'Salvage', 'bldg'],
      ['LCC_OM - Building - Life Cycle Costs', 'Maintenance', 'bldg'],
    ]);
  });

  it('prints the result as JSON', () => {
    const { io, state } = createFakeIO({ 'model.json': JSON.stringify(modelDocument) });

    createProgram(io, registry).parse(['run', MEASURE_ID, '-m', 'model.json', '-a', 'remove_costs=false', '--json'], { from: 'user' });

    const result = JSON.parse(state.stdout.join('\n'));
    expect(result.outcome).toBe('NA');
    expect(result.finalCondition).toBe(
      'A new lifecycle cost object was added to the building. The building has an area of 10,764 (ft^2). Material and Installation costs are $5,000.',
    );
    expect(state.files.has('out.json')).toBe(false);
  });

  it('exits with 1 when the measure fails', () => {
    const { io, state } = createFakeIO({ 'model.json': JSON.stringify(modelDocument) });

    createProgram(io, registry).parse([
      'run', MEASURE_ID, '-m', 'model.json', '-a', 'material_cost_ip=2', '-a', 'expected_life=0',
    ], { from: 'user' });

    expect(state.stdout).toEqual([
      'Add Cost per Floor Area to Building: Fail',
      'Error: Choose an integer greater than 0 and less than or equal to 100 for Expected Life.',
    ]);
    expect(state.exitCode).toBe(1);
  });

  it('reports unknown measures, arguments and files on stderr', () => {
    const unknownMeasure = createFakeIO();
    createProgram(unknownMeasure.io, registry).parse(['describe', 'nope'], { from: 'user' });
    expect(unknownMeasure.state.stderr).toEqual([`Error: Unknown measure "nope" (registered: ${MEASURE_ID})`]);
    expect(unknownMeasure.state.exitCode).toBe(1);

    const unknownArgument = createFakeIO({ 'model.json': JSON.stringify(modelDocument) });
    createProgram(unknownArgument.io, registry).parse(['run', MEASURE_ID, '-m', 'model.json', '-a', 'colour=red'], { from: 'user' });
    expect(unknownArgument.state.stderr).toEqual(['Error: Unknown argument "colour"']);

    const missingFile = createFakeIO();
    createProgram(missingFile.io, registry).parse(['run', MEASURE_ID, '-m', 'missing.json'], { from: 'user' });
    expect(missingFile.state.stderr).toEqual(["Error: ENOENT: no such file, open 'missing.json'"]);
    expect(missingFile.state.exitCode).toBe(1);
  });

  it('reports malformed model documents', () => {
    const { io, state } = createFakeIO({ 'model.json': JSON.stringify({ building: { handle: 'b', name: 'B' } }) });
    createProgram(io, registry).parse(['run', MEASURE_ID, '-m', 'model.json'], { from: 'user' });

    expect(state.stderr).toEqual(['Error: building.floorArea: expected a finite number']);
    expect(state.exitCode).toBe(1);
  });
});

describe('formatResult', () => {
  it('lists conditions and messages in order', () => {
    expect(formatResult('Demo', {
      outcome: 'NA',
      initialCondition: 'start',
      finalCondition: 'end',
      info: ['i'],
      warnings: ['w'],
      errors: [],
    })).toEqual(['Demo: NA', 'Initial condition: start', 'Info: i', 'Warning: w', 'Final condition: end']);
  });
});
