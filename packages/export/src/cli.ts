/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for splitting a model document by building story
 *
 * Options are layered: defaults, STOREY_SPLIT_* environment variables, the
 * document's unit, then command-line flags.
 */

import { Command, InvalidArgumentError } from 'commander';
import { isLengthUnit } from '@storey-split/data';
import type { LengthUnit } from '@storey-split/data';
import type { BelowBaseLevelMode } from '@storey-split/levels';
import { exportOptionsFromEnv } from './export-options.js';
import type { ExportOptions } from './export-options.js';
import { ExportPass } from './export-pass.js';
import { InMemoryModel } from './in-memory-model.js';
import { formatExportResult, writeExportResult } from './result-writer.js';

export const VERSION = '0.1.0';

export interface CliIO {
  stdout(text: string): void;
  env: NodeJS.ProcessEnv;
}

interface SplitCommandOptions {
  split: boolean;
  unit?: LengthUnit;
  extension?: number;
  belowBase?: BelowBaseLevelMode;
  deriveHeights: boolean;
  continueOnError: boolean;
  splitOnly: boolean;
  compact: boolean;
  output?: string;
}

function parseUnit(value: string): LengthUnit {
  if (!isLengthUnit(value)) {
    throw new InvalidArgumentError('Expected one of ft, in, m, cm, mm.');
  }
  return value;
}

function parseExtension(value: string): number {
  const extension = Number(value);
  if (value.trim() === '' || !Number.isFinite(extension) || extension < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return extension;
}

function parseBelowBase(value: string): BelowBaseLevelMode {
  if (value !== 'clip' && value !== 'include') {
    throw new InvalidArgumentError('Expected "clip" or "include".');
  }
  return value;
}

const defaultIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  env: process.env,
};

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('storey-split')
    .description('Split columns, walls and duct segments of a model into per-story vertical ranges')
    .version(VERSION)
    .argument('<model>', 'Path to a JSON model document')
    .option('--no-split', 'Disable splitting by level')
    .option('-u, --unit <unit>', 'Model length unit (ft, in, m, cm, mm)', parseUnit)
    .option('-e, --extension <value>', 'Level extension in model units (default: 10cm)', parseExtension)
    .option('--below-base <mode>', 'Part below the base level: clip or include', parseBelowBase)
    .option('--derive-heights', 'Use the distance to the next story as default story height', false)
    .option('--continue-on-error', 'Record failing elements and carry on', false)
    .option('--split-only', 'Only list elements that are split', false)
    .option('--compact', 'Write JSON without indentation', false)
    .option('-o, --output <file>', 'Write the result to a file instead of stdout')
    .action(async (modelPath: string, options: SplitCommandOptions) => {
      const model = await InMemoryModel.fromFile(modelPath);

      const exportOptions: Partial<ExportOptions> = {
        ...exportOptionsFromEnv(io.env),
        ...(model.unit ? { lengthUnit: model.unit } : {}),
      };
      if (!options.split) exportOptions.splitElementsByLevel = false;
      if (options.unit) exportOptions.lengthUnit = options.unit;
      if (options.extension !== undefined) exportOptions.levelExtension = options.extension;
      if (options.belowBase) exportOptions.belowBaseLevel = options.belowBase;
      if (options.deriveHeights) exportOptions.deriveDefaultHeights = true;
      if (options.continueOnError) exportOptions.continueOnError = true;

      const result = new ExportPass(model, exportOptions).run();
      const format = { pretty: !options.compact, splitOnly: options.splitOnly };

      if (options.output) {
        await writeExportResult(result, options.output, format);
      } else {
        io.stdout(formatExportResult(result, format));
      }
    });

  return program;
}
