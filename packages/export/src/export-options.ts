/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Export configuration, read once per pass
 */

import { isLengthUnit, levelExtensionFor } from '@storey-split/data';
import type { LengthUnit } from '@storey-split/data';
import type { BelowBaseLevelMode, SegmentationOptions } from '@storey-split/levels';
import { ExportOptionsError } from './errors.js';

export interface ExportOptions {
  /** Split columns, walls and duct segments into one piece per building story */
  splitElementsByLevel: boolean;
  /** Length unit of the model's elevations and bounding boxes */
  lengthUnit: LengthUnit;
  /** Overflow allowed past a level, in model units (default: 10cm in lengthUnit) */
  levelExtension?: number;
  belowBaseLevel: BelowBaseLevelMode;
  /** Give stories without an "up to level" the distance to the next story as height */
  deriveDefaultHeights: boolean;
  /** Record per-element failures and carry on instead of aborting the pass */
  continueOnError: boolean;
}

export const DEFAULT_EXPORT_OPTIONS: ExportOptions = {
  splitElementsByLevel: true,
  lengthUnit: 'ft',
  belowBaseLevel: 'clip',
  deriveDefaultHeights: false,
  continueOnError: false,
};

export const ENV_PREFIX = 'STOREY_SPLIT_';

function isBelowBaseLevelMode(value: string): value is BelowBaseLevelMode {
  return value === 'clip' || value === 'include';
}

/**
 * Merges options over the defaults and validates them
 */
export function resolveExportOptions(options: Partial<ExportOptions> = {}): ExportOptions {
  const resolved: ExportOptions = { ...DEFAULT_EXPORT_OPTIONS, ...options };

  if (!isLengthUnit(resolved.lengthUnit)) {
    throw new ExportOptionsError(`unsupported unit "${resolved.lengthUnit}"`, 'lengthUnit');
  }
  if (!isBelowBaseLevelMode(resolved.belowBaseLevel)) {
    throw new ExportOptionsError(`expected "clip" or "include", got "${resolved.belowBaseLevel}"`, 'belowBaseLevel');
  }
  if (
    resolved.levelExtension !== undefined &&
    !(Number.isFinite(resolved.levelExtension) && resolved.levelExtension >= 0)
  ) {
    throw new ExportOptionsError(`must be a non-negative number, got ${resolved.levelExtension}`, 'levelExtension');
  }

  return resolved;
}

/** Level extension in effect for the options */
export function effectiveLevelExtension(options: ExportOptions): number {
  return options.levelExtension ?? levelExtensionFor(options.lengthUnit);
}

export function toSegmentationOptions(options: ExportOptions): SegmentationOptions {
  return {
    splitElementsByLevel: options.splitElementsByLevel,
    levelExtension: effectiveLevelExtension(options),
    belowBaseLevel: options.belowBaseLevel,
  };
}

function parseBoolean(value: string, option: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ExportOptionsError(`expected a boolean, got "${value}"`, option);
  }
}

/**
 * Options set through STOREY_SPLIT_* environment variables
 */
export function exportOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ExportOptions> {
  const options: Partial<ExportOptions> = {};

  const split = env[`${ENV_PREFIX}SPLIT_BY_LEVEL`];
  if (split !== undefined) {
    options.splitElementsByLevel = parseBoolean(split, `${ENV_PREFIX}SPLIT_BY_LEVEL`);
  }

  const unit = env[`${ENV_PREFIX}UNIT`];
  if (unit !== undefined) {
    if (!isLengthUnit(unit)) {
      throw new ExportOptionsError(`unsupported unit "${unit}"`, `${ENV_PREFIX}UNIT`);
    }
    options.lengthUnit = unit;
  }

  const extension = env[`${ENV_PREFIX}LEVEL_EXTENSION`];
  if (extension !== undefined) {
    const value = Number(extension);
    if (extension.trim() === '' || Number.isNaN(value)) {
      throw new ExportOptionsError(`expected a number, got "${extension}"`, `${ENV_PREFIX}LEVEL_EXTENSION`);
    }
    options.levelExtension = value;
  }

  const belowBase = env[`${ENV_PREFIX}BELOW_BASE_LEVEL`];
  if (belowBase !== undefined) {
    if (!isBelowBaseLevelMode(belowBase)) {
      throw new ExportOptionsError(`expected "clip" or "include", got "${belowBase}"`, `${ENV_PREFIX}BELOW_BASE_LEVEL`);
    }
    options.belowBaseLevel = belowBase;
  }

  const derive = env[`${ENV_PREFIX}DERIVE_HEIGHTS`];
  if (derive !== undefined) {
    options.deriveDefaultHeights = parseBoolean(derive, `${ENV_PREFIX}DERIVE_HEIGHTS`);
  }

  const continueOnError = env[`${ENV_PREFIX}CONTINUE_ON_ERROR`];
  if (continueOnError !== undefined) {
    options.continueOnError = parseBoolean(continueOnError, `${ENV_PREFIX}CONTINUE_ON_ERROR`);
  }

  return options;
}
