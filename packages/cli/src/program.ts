/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * lcc-measure command definitions
 *
 * Kept apart from the bin entry so commands can be driven with a fake CliIO.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { Command } from 'commander';
import { InMemoryModel, createLogger, createModel } from '@lcc-measures/model';
import {
  applyMeasure,
  describeMeasure,
  measureRegistry,
  parseArgumentAssignments,
  type MeasureRegistry,
  type MeasureResult,
} from '@lcc-measures/measure';

const log = createLogger('CLI');

/** Side effects of the CLI, injectable for tests */
export interface CliIO {
  readFile(path: string): string;
  writeFile(path: string, content: string): void;
  stdout(line: string): void;
  stderr(line: string): void;
  setExitCode(code: number): void;
}

export const nodeIO: CliIO = {
  readFile: path => readFileSync(path, 'utf-8'),
  writeFile: (path, content) => writeFileSync(path, content, 'utf-8'),
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  setExitCode: code => {
    process.exitCode = code;
  },
};

interface RunOptions {
  model: string;
  arg: string[];
  output?: string;
  json: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Human-readable summary of a measure result */
export function formatResult(measureName: string, result: MeasureResult): string[] {
  const lines = [`${measureName}: ${result.outcome}`];
  if (result.initialCondition !== null) {
    lines.push(`Initial condition: ${result.initialCondition}`);
  }
  for (const message of result.info) lines.push(`Info: ${message}`);
  for (const message of result.warnings) lines.push(`Warning: ${message}`);
  for (const message of result.errors) lines.push(`Error: ${message}`);
  if (result.finalCondition !== null) {
    lines.push(`Final condition: ${result.finalCondition}`);
  }
  return lines;
}

/** Wrap an action so any error is reported on stderr with exit code 1 */
function guarded<A extends unknown[]>(io: CliIO, action: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (error) {
      log.debug('Command failed', error);
      io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
      io.setExitCode(1);
    }
  };
}

export function createProgram(io: CliIO = nodeIO, registry: MeasureRegistry = measureRegistry): Command {
  const program = new Command();

  program
    .name('lcc-measure')
    .description('Apply life cycle cost measures to building models')
    .version('0.1.0')
    .configureOutput({
      writeOut: str => io.stdout(str.trimEnd()),
      writeErr: str => io.stderr(str.trimEnd()),
    });

  program
    .command('list')
    .description('List registered measures')
    .action(guarded(io, () => {
      for (const measure of registry.list()) {
        io.stdout(`${measure.id}\t${measure.name()}`);
      }
    }));

  program
    .command('describe')
    .description('Print the manifest of a measure as JSON')
    .argument('<measure>', 'Measure id (see "list")')
    .action(guarded(io, (measureId: string) => {
      const measure = registry.get(measureId);
      const manifest = describeMeasure(measure, createModel(new InMemoryModel()));
      io.stdout(JSON.stringify(manifest, null, 2));
    }));

  program
    .command('run')
    .description('Run a measure against a model document')
    .argument('<measure>', 'Measure id (see "list")')
    .requiredOption('-m, --model <file>', 'Model document (JSON)')
    .option('-a, --arg <name=value>', 'Argument value, repeatable', collect, [])
    .option('-o, --output <file>', 'Write the resulting model document here')
    .option('--json', 'Print the result as JSON', false)
    .action(guarded(io, (measureId: string, options: RunOptions) => {
      const measure = registry.get(measureId);

      const backend = InMemoryModel.fromDocument(JSON.parse(io.readFile(options.model)));
      const model = createModel(backend);
      const userArguments = parseArgumentAssignments(measure.arguments(model), options.arg);

      log.info(`Running ${measure.id} on ${options.model}`, { data: userArguments });
      const result = applyMeasure(measure, model, userArguments);

      if (options.json) {
        io.stdout(JSON.stringify(result, null, 2));
      } else {
        for (const line of formatResult(measure.name(), result)) {
          io.stdout(line);
        }
      }

      if (options.output) {
        io.writeFile(options.output, `${JSON.stringify(backend.toDocument(), null, 2)}\n`);
        if (!options.json) {
          io.stdout(`Wrote model to ${options.output}`);
        }
      }

      if (result.outcome === 'Fail') {
        io.setExitCode(1);
      }
    }));

  return program;
}
