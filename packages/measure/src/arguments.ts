/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Measure argument declarations
 *
 * A measure declares its inputs as MeasureArguments; the host shows them to
 * the user and hands the chosen values back as UserArguments.
 *
 *   MeasureArgument.makeDoubleArgument('material_cost_ip')
 *     .setDisplayName('Material and Installation Costs')
 *     .setUnits('$/ft^2')
 *     .setDefaultValue(0.0)
 */

import { MeasureArgumentError } from './errors.js';

export type ArgumentType = 'Boolean' | 'Double' | 'Integer' | 'String' | 'Choice';

export type ArgumentValue = boolean | number | string;

/** Values chosen by the user, keyed by argument name */
export type UserArguments = Readonly<Record<string, ArgumentValue>>;

/** Serializable form of an argument declaration */
export interface ArgumentManifest {
  name: string;
  displayName: string;
  description: string;
  type: ArgumentType;
  required: boolean;
  units: string | null;
  defaultValue: ArgumentValue | null;
  choices: string[];
}

export class MeasureArgument {
  private _displayName: string;
  private _description = '';
  private _units: string | null = null;
  private _defaultValue: ArgumentValue | null = null;

  private constructor(
    readonly name: string,
    readonly type: ArgumentType,
    readonly required: boolean,
    readonly choices: readonly string[] = [],
  ) {
    if (!name) {
      throw new MeasureArgumentError('Argument name must not be empty', name);
    }
    this._displayName = name;
  }

  static makeBoolArgument(name: string, required = true): MeasureArgument {
    return new MeasureArgument(name, 'Boolean', required);
  }

  static makeDoubleArgument(name: string, required = true): MeasureArgument {
    return new MeasureArgument(name, 'Double', required);
  }

  static makeIntegerArgument(name: string, required = true): MeasureArgument {
    return new MeasureArgument(name, 'Integer', required);
  }

  static makeStringArgument(name: string, required = true): MeasureArgument {
    return new MeasureArgument(name, 'String', required);
  }

  static makeChoiceArgument(name: string, choices: readonly string[], required = true): MeasureArgument {
    if (choices.length === 0) {
      throw new MeasureArgumentError(`Choice argument "${name}" needs at least one choice`, name);
    }
    return new MeasureArgument(name, 'Choice', required, [...choices]);
  }

  get displayName(): string { return this._displayName; }
  get description(): string { return this._description; }
  get units(): string | null { return this._units; }
  get defaultValue(): ArgumentValue | null { return this._defaultValue; }

  setDisplayName(displayName: string): this {
    this._displayName = displayName;
    return this;
  }

  setDescription(description: string): this {
    this._description = description;
    return this;
  }

  setUnits(units: string): this {
    this._units = units;
    return this;
  }

  setDefaultValue(value: ArgumentValue): this {
    if (!this.accepts(value)) {
      throw new MeasureArgumentError(
        `Default value ${JSON.stringify(value)} is not a valid ${this.type} for "${this.name}"`,
        this.name,
      );
    }
    this._defaultValue = value;
    return this;
  }

  /** True if the value has the right type (and is one of the choices, for Choice arguments) */
  accepts(value: unknown): value is ArgumentValue {
    switch (this.type) {
      case 'Boolean':
        return typeof value === 'boolean';
      case 'Double':
        return typeof value === 'number' && Number.isFinite(value);
      case 'Integer':
        return typeof value === 'number' && Number.isInteger(value);
      case 'String':
        return typeof value === 'string';
      case 'Choice':
        return typeof value === 'string' && this.choices.includes(value);
    }
  }

  toJSON(): ArgumentManifest {
    return {
      name: this.name,
      displayName: this._displayName,
      description: this._description,
      type: this.type,
      required: this.required,
      units: this._units,
      defaultValue: this._defaultValue,
      choices: [...this.choices],
    };
  }
}

/**
 * Parse a value typed as text (command line, form field) for an argument.
 *
 * @throws MeasureArgumentError if the text is not a valid value
 */
export function parseArgumentValue(argument: MeasureArgument, text: string): ArgumentValue {
  const trimmed = text.trim();
  let value: ArgumentValue | null = null;

  switch (argument.type) {
    case 'Boolean': {
      const lower = trimmed.toLowerCase();
      if (lower === 'true') value = true;
      else if (lower === 'false') value = false;
      break;
    }
    case 'Integer':
      if (/^[+-]?\d+$/.test(trimmed)) value = Number(trimmed);
      break;
    case 'Double':
      if (trimmed !== '' && Number.isFinite(Number(trimmed))) value = Number(trimmed);
      break;
    case 'String':
      value = text;
      break;
    case 'Choice':
      value = trimmed;
      break;
  }

  if (value === null || !argument.accepts(value)) {
    throw new MeasureArgumentError(
      `Invalid ${argument.type} value "${text}" for argument "${argument.name}"`,
      argument.name,
    );
  }
  return value;
}

/**
 * Turn "name=value" assignments into UserArguments for the given declarations.
 *
 * @throws MeasureArgumentError for malformed assignments, unknown names or invalid values
 */
export function parseArgumentAssignments(
  declared: readonly MeasureArgument[],
  assignments: readonly string[],
): Record<string, ArgumentValue> {
  const byName = new Map(declared.map(arg => [arg.name, arg]));
  const result: Record<string, ArgumentValue> = {};

  for (const assignment of assignments) {
    const eqIdx = assignment.indexOf('=');
    if (eqIdx <= 0) {
      throw new MeasureArgumentError(`Expected name=value, got "${assignment}"`, assignment);
    }
    const name = assignment.slice(0, eqIdx).trim();
    const argument = byName.get(name);
    if (!argument) {
      throw new MeasureArgumentError(`Unknown argument "${name}"`, name);
    }
    result[name] = parseArgumentValue(argument, assignment.slice(eqIdx + 1));
  }

  return result;
}
