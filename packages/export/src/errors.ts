/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/** Error thrown when a JSON model document is malformed */
export class ModelDocumentError extends Error {
  constructor(
    message: string,
    /** JSON path of the offending value, e.g. "levels[2].elevation" */
    public readonly path?: string
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ModelDocumentError';
  }
}

/** Error thrown for invalid export configuration */
export class ExportOptionsError extends Error {
  constructor(
    message: string,
    public readonly option: string
  ) {
    super(`${option}: ${message}`);
    this.name = 'ExportOptionsError';
  }
}
