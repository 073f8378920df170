/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @storey-split/export - Export passes, configuration and model documents
 */

export { ExportPass } from './export-pass.js';
export type { ExportPassResult, ElementFragments, ElementFailure, LevelFragment } from './export-pass.js';
export {
  DEFAULT_EXPORT_OPTIONS,
  ENV_PREFIX,
  resolveExportOptions,
  effectiveLevelExtension,
  toSegmentationOptions,
  exportOptionsFromEnv,
} from './export-options.js';
export type { ExportOptions } from './export-options.js';
export { parseModelDocument, parseModelDocumentText } from './model-document.js';
export type { ModelDocument } from './model-document.js';
export { InMemoryModel } from './in-memory-model.js';
export { formatExportResult, writeExportResult } from './result-writer.js';
export type { ResultFormatOptions } from './result-writer.js';
export { ModelDocumentError, ExportOptionsError } from './errors.js';
export { createProgram, VERSION } from './cli.js';
export type { CliIO } from './cli.js';
