/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * MeasureRunner — the host side of a measure run.
 *
 * Validates and serves user arguments, and collects the messages a measure
 * registers. Messages are mirrored to the debug log.
 */

import { createLogger, type Logger } from '@lcc-measures/model';
import { MeasureArgumentError } from './errors.js';
import type { ArgumentValue, MeasureArgument, UserArguments } from './arguments.js';

/** Success: the measure ran. Fail: it reported an error. NA: nothing applied to this model. */
export type MeasureOutcome = 'Success' | 'Fail' | 'NA';

export interface MeasureResult {
  outcome: MeasureOutcome;
  initialCondition: string | null;
  finalCondition: string | null;
  info: string[];
  warnings: string[];
  errors: string[];
}

export class MeasureRunner {
  private outcome: MeasureOutcome = 'Success';
  private initialCondition: string | null = null;
  private finalCondition: string | null = null;
  private info: string[] = [];
  private warnings: string[] = [];
  private errors: string[] = [];
  private declared = new Map<string, MeasureArgument>();
  private log: Logger;

  constructor(logger: Logger = createLogger('MeasureRunner')) {
    this.log = logger;
  }

  /**
   * Check user arguments against the declarations.
   * Registers an error for every bad value or missing required argument,
   * and a warning for names that were not declared.
   */
  validateUserArguments(declared: readonly MeasureArgument[], userArguments: UserArguments): boolean {
    this.declared = new Map(declared.map(arg => [arg.name, arg]));
    let valid = true;

    for (const argument of declared) {
      const value = userArguments[argument.name];
      if (value === undefined) {
        if (argument.required && argument.defaultValue === null) {
          this.registerError(`Required argument "${argument.name}" has no value.`);
          valid = false;
        }
        continue;
      }
      if (!argument.accepts(value)) {
        this.registerError(`Invalid ${argument.type} value ${JSON.stringify(value)} for argument "${argument.name}".`);
        valid = false;
      }
    }

    for (const name of Object.keys(userArguments)) {
      if (!this.declared.has(name)) {
        this.registerWarning(`Ignoring unknown argument "${name}".`);
      }
    }

    return valid;
  }

  getBoolArgumentValue(name: string, userArguments: UserArguments): boolean {
    const value = this.argumentValue(name, userArguments);
    if (typeof value !== 'boolean') {
      throw new MeasureArgumentError(`Argument "${name}" is not a Boolean`, name);
    }
    return value;
  }

  getDoubleArgumentValue(name: string, userArguments: UserArguments): number {
    const value = this.argumentValue(name, userArguments);
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new MeasureArgumentError(`Argument "${name}" is not a Double`, name);
    }
    return value;
  }

  getIntegerArgumentValue(name: string, userArguments: UserArguments): number {
    const value = this.argumentValue(name, userArguments);
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new MeasureArgumentError(`Argument "${name}" is not an Integer`, name);
    }
    return value;
  }

  /** Also reads Choice arguments */
  getStringArgumentValue(name: string, userArguments: UserArguments): string {
    const value = this.argumentValue(name, userArguments);
    if (typeof value !== 'string') {
      throw new MeasureArgumentError(`Argument "${name}" is not a String`, name);
    }
    return value;
  }

  registerInfo(message: string): void {
    this.info.push(message);
    this.log.debug(`info: ${message}`);
  }

  registerWarning(message: string): void {
    this.warnings.push(message);
    this.log.debug(`warning: ${message}`);
  }

  registerError(message: string): void {
    this.errors.push(message);
    this.outcome = 'Fail';
    this.log.debug(`error: ${message}`);
  }

  /** Mark the run as not applicable to this model; an earlier error still wins */
  registerAsNotApplicable(message: string): void {
    this.info.push(message);
    if (this.outcome !== 'Fail') {
      this.outcome = 'NA';
    }
    this.log.debug(`not applicable: ${message}`);
  }

  registerInitialCondition(message: string): void {
    this.initialCondition = message;
    this.log.debug(`initial condition: ${message}`);
  }

  registerFinalCondition(message: string): void {
    this.finalCondition = message;
    this.log.debug(`final condition: ${message}`);
  }

  result(): MeasureResult {
    return {
      outcome: this.outcome,
      initialCondition: this.initialCondition,
      finalCondition: this.finalCondition,
      info: [...this.info],
      warnings: [...this.warnings],
      errors: [...this.errors],
    };
  }

  private argumentValue(name: string, userArguments: UserArguments): ArgumentValue {
    const value = userArguments[name] ?? this.declared.get(name)?.defaultValue ?? null;
    if (value === null) {
      throw new MeasureArgumentError(`Argument "${name}" has no value`, name);
    }
    return value;
  }
}
