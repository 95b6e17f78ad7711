/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import {
  MeasureArgument,
  MeasureArgumentError,
  parseArgumentAssignments,
  parseArgumentValue,
} from './index.js';

describe('MeasureArgument', () => {
  it('records display metadata', () => {
    const arg = MeasureArgument.makeDoubleArgument('rate')
      .setDisplayName('Rate')
      .setDescription('Cost per area')
      .setUnits('$/ft^2')
      .setDefaultValue(0.0);

    expect(arg.toJSON()).toEqual({
      name: 'rate',
      displayName: 'Rate',
      description: 'Cost per area',
      type: 'Double',
      required: true,
      units: '$/ft^2',
      defaultValue: 0,
      choices: [],
    });
  });

  it('uses the name as display name until one is set', () => {
    expect(MeasureArgument.makeBoolArgument('flag', false).displayName).toBe('flag');
  });

  it('rejects defaults of the wrong type', () => {
    expect(() => MeasureArgument.makeIntegerArgument('years').setDefaultValue(2.5))
      .toThrow('Default value 2.5 is not a valid Integer for "years"');
    expect(() => MeasureArgument.makeBoolArgument('flag').setDefaultValue('yes')).toThrow(MeasureArgumentError);
    expect(() => MeasureArgument.makeChoiceArgument('mode', ['a', 'b']).setDefaultValue('c')).toThrow(MeasureArgumentError);
  });

  it('requires choices for choice arguments', () => {
    expect(() => MeasureArgument.makeChoiceArgument('mode', [])).toThrow('Choice argument "mode" needs at least one choice');
  });

  it('checks value types', () => {
    const integer = MeasureArgument.makeIntegerArgument('n');
    expect(integer.accepts(3)).toBe(true);
    expect(integer.accepts(3.5)).toBe(false);
    expect(integer.accepts('3')).toBe(false);

    const double = MeasureArgument.makeDoubleArgument('x');
    expect(double.accepts(3.5)).toBe(true);
    expect(double.accepts(Number.POSITIVE_INFINITY)).toBe(false);
  });
});

describe('parseArgumentValue', () => {
  it('parses each argument type', () => {
    expect(parseArgumentValue(MeasureArgument.makeBoolArgument('b'), 'TRUE')).toBe(true);
    expect(parseArgumentValue(MeasureArgument.makeBoolArgument('b'), 'false')).toBe(false);
    expect(parseArgumentValue(MeasureArgument.makeIntegerArgument('i'), ' -4 ')).toBe(-4);
    expect(parseArgumentValue(MeasureArgument.makeDoubleArgument('d'), '2.75')).toBe(2.75);
    expect(parseArgumentValue(MeasureArgument.makeStringArgument('s'), ' padded ')).toBe(' padded ');
    expect(parseArgumentValue(MeasureArgument.makeChoiceArgument('c', ['low', 'high']), 'high')).toBe('high');
  });

  it('rejects text that is not a value of the type', () => {
    expect(() => parseArgumentValue(MeasureArgument.makeBoolArgument('b'), 'yes'))
      .toThrow('Invalid Boolean value "yes" for argument "b"');
    expect(() => parseArgumentValue(MeasureArgument.makeIntegerArgument('i'), '1.5')).toThrow(MeasureArgumentError);
    expect(() => parseArgumentValue(MeasureArgument.makeDoubleArgument('d'), '')).toThrow(MeasureArgumentError);
    expect(() => parseArgumentValue(MeasureArgument.makeDoubleArgument('d'), 'abc')).toThrow(MeasureArgumentError);
    expect(() => parseArgumentValue(MeasureArgument.makeChoiceArgument('c', ['low']), 'mid')).toThrow(MeasureArgumentError);
  });
});

describe('parseArgumentAssignments', () => {
  const declared = [
    MeasureArgument.makeStringArgument('label'),
    MeasureArgument.makeIntegerArgument('years'),
  ];

  it('maps name=value pairs to typed values', () => {
    expect(parseArgumentAssignments(declared, ['label=a=b', 'years=12'])).toEqual({ label: 'a=b', years: 12 });
  });

  it('rejects unknown names and malformed pairs', () => {
    expect(() => parseArgumentAssignments(declared, ['colour=red'])).toThrow('Unknown argument "colour"');
    expect(() => parseArgumentAssignments(declared, ['years'])).toThrow('Expected name=value, got "years"');
    expect(() => parseArgumentAssignments(declared, ['=3'])).toThrow(MeasureArgumentError);
  });
});
