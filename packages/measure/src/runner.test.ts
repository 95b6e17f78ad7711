/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi } from 'vitest';
import { InMemoryModel, createModel, type Model, type Logger } from '@lcc-measures/model';
import {
  MeasureArgument,
  MeasureArgumentError,
  MeasureRegistry,
  MeasureRegistryError,
  MeasureRunner,
  ModelMeasure,
  applyMeasure,
  describeMeasure,
  type UserArguments,
} from './index.js';

function declarations(): MeasureArgument[] {
  return [
    MeasureArgument.makeBoolArgument('enabled').setDefaultValue(true),
    MeasureArgument.makeStringArgument('label'),
    MeasureArgument.makeDoubleArgument('rate').setDefaultValue(1.5),
    MeasureArgument.makeIntegerArgument('years', false),
  ];
}

/** Measure that reports its arguments back */
class EchoMeasure extends ModelMeasure {
  readonly id = 'echo';

  name(): string { return 'Echo'; }
  description(): string { return 'Reports its arguments.'; }
  modelerDescription(): string { return 'Does not touch the model.'; }

  arguments(_model: Model): MeasureArgument[] {
    return declarations();
  }

  run(model: Model, runner: MeasureRunner, userArguments: UserArguments): boolean {
    if (!super.run(model, runner, userArguments)) return false;

    const label = runner.getStringArgumentValue('label', userArguments);
    if (label === 'skip') {
      runner.registerAsNotApplicable('Nothing to do.');
      return true;
    }
    if (label === 'refuse') {
      return false;
    }
    runner.registerInitialCondition(`enabled=${runner.getBoolArgumentValue('enabled', userArguments)}`);
    runner.registerFinalCondition(`rate=${runner.getDoubleArgumentValue('rate', userArguments)}`);
    return true;
  }
}

function emptyModel(): Model {
  return createModel(new InMemoryModel());
}

describe('MeasureRunner', () => {
  it('accepts valid arguments and serves defaults', () => {
    const runner = new MeasureRunner();
    const user = { label: 'x' };

    expect(runner.validateUserArguments(declarations(), user)).toBe(true);
    expect(runner.getBoolArgumentValue('enabled', user)).toBe(true);
    expect(runner.getDoubleArgumentValue('rate', user)).toBe(1.5);
    expect(runner.getStringArgumentValue('label', user)).toBe('x');
    expect(runner.result().errors).toEqual([]);
  });

  it('prefers user values over defaults, including false', () => {
    const runner = new MeasureRunner();
    const user = { label: 'x', enabled: false, rate: 0 };
    runner.validateUserArguments(declarations(), user);

    expect(runner.getBoolArgumentValue('enabled', user)).toBe(false);
    expect(runner.getDoubleArgumentValue('rate', user)).toBe(0);
  });

  it('reports missing required arguments and wrong types', () => {
    const runner = new MeasureRunner();

    expect(runner.validateUserArguments(declarations(), { rate: 'high', years: 2.5 })).toBe(false);
    expect(runner.result()).toMatchObject({
      outcome: 'Fail',
      errors: [
        'Required argument "label" has no value.',
        'Invalid Double value "high" for argument "rate".',
        'Invalid Integer value 2.5 for argument "years".',
      ],
    });
  });

  it('warns about undeclared arguments', () => {
    const runner = new MeasureRunner();
    expect(runner.validateUserArguments(declarations(), { label: 'x', colour: 'red' })).toBe(true);
    expect(runner.result().warnings).toEqual(['Ignoring unknown argument "colour".']);
  });

  it('throws when an argument has no value or the wrong type', () => {
    const runner = new MeasureRunner();
    const user = { label: 'x' };
    runner.validateUserArguments(declarations(), user);

    expect(() => runner.getIntegerArgumentValue('years', user)).toThrow('Argument "years" has no value');
    expect(() => runner.getBoolArgumentValue('label', user)).toThrow(MeasureArgumentError);
  });

  it('keeps Fail over a later not-applicable', () => {
    const runner = new MeasureRunner();
    runner.registerError('broken');
    runner.registerAsNotApplicable('nothing to do');
    expect(runner.result().outcome).toBe('Fail');
    expect(runner.result().info).toEqual(['nothing to do']);
  });

  it('mirrors messages to the logger', () => {
    const logger: Logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const runner = new MeasureRunner(logger);

    runner.registerInfo('hello');
    runner.registerFinalCondition('done');

    expect(logger.debug).toHaveBeenCalledWith('info: hello');
    expect(logger.debug).toHaveBeenCalledWith('final condition: done');
  });
});

describe('applyMeasure', () => {
  it('returns Success with conditions', () => {
    const result = applyMeasure(new EchoMeasure(), emptyModel(), { label: 'go', rate: 2 });
    expect(result).toEqual({
      outcome: 'Success',
      initialCondition: 'enabled=true',
      finalCondition: 'rate=2',
      info: [],
      warnings: [],
      errors: [],
    });
  });

  it('returns NA when the measure does not apply', () => {
    const result = applyMeasure(new EchoMeasure(), emptyModel(), { label: 'skip' });
    expect(result.outcome).toBe('NA');
    expect(result.info).toEqual(['Nothing to do.']);
  });

  it('returns Fail when run returns false', () => {
    expect(applyMeasure(new EchoMeasure(), emptyModel(), { label: 'refuse' }).outcome).toBe('Fail');
    expect(applyMeasure(new EchoMeasure(), emptyModel(), {}).outcome).toBe('Fail');
  });
});

describe('describeMeasure', () => {
  it('lists metadata and argument declarations', () => {
    const manifest = describeMeasure(new EchoMeasure(), emptyModel());
    expect(manifest.id).toBe('echo');
    expect(manifest.className).toBe('EchoMeasure');
    expect(manifest.name).toBe('Echo');
    expect(manifest.arguments.map(arg => `${arg.name}:${arg.type}:${arg.required}`)).toEqual([
      'enabled:Boolean:true',
      'label:String:true',
      'rate:Double:true',
      'years:Integer:false',
    ]);
  });
});

describe('MeasureRegistry', () => {
  it('registers measures through registerWithApplication', () => {
    const registry = new MeasureRegistry();
    const measure = new EchoMeasure();
    measure.registerWithApplication(registry);
    measure.registerWithApplication(registry);

    expect(registry.has('echo')).toBe(true);
    expect(registry.get('echo')).toBe(measure);
    expect(registry.list()).toHaveLength(1);
  });

  it('refuses a second measure under the same id', () => {
    const registry = new MeasureRegistry();
    registry.register(new EchoMeasure());
    expect(() => registry.register(new EchoMeasure())).toThrow(MeasureRegistryError);
  });

  it('names the registered measures when a lookup fails', () => {
    const registry = new MeasureRegistry();
    expect(() => registry.get('missing')).toThrow('Unknown measure "missing" (registered: none)');
    registry.register(new EchoMeasure());
    expect(() => registry.get('missing')).toThrow('Unknown measure "missing" (registered: echo)');
  });
});
