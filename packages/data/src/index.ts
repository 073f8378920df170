/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @storey-split/data - Shared model types, ranges, tolerances and logging
 */

export * from './types.js';
export { VerticalRangeUtils } from './vertical-range.js';
export type { VerticalRange } from './vertical-range.js';
export { EPS, isAlmostZero, LENGTH_UNITS, LEVEL_EXTENSION_CM, isLengthUnit, levelExtensionFor } from './tolerance.js';
export type { LengthUnit } from './tolerance.js';
export { createLogger, isDebugEnabled, formatContext, DEBUG_ENV_VAR } from './logger.js';
export type { Logger, LogContext } from './logger.js';
