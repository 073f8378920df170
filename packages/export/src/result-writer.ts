/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { writeFile } from 'node:fs/promises';
import type { ExportPassResult } from './export-pass.js';

export interface ResultFormatOptions {
  /** Indent the JSON (default: true) */
  pretty?: boolean;
  /** Leave out elements that are exported whole (default: false) */
  splitOnly?: boolean;
}

export function formatExportResult(result: ExportPassResult, options: ResultFormatOptions = {}): string {
  const { pretty = true, splitOnly = false } = options;
  const output: ExportPassResult = splitOnly
    ? { ...result, elements: result.elements.filter((entry) => entry.fragments.length > 0) }
    : result;
  return JSON.stringify(output, null, pretty ? 2 : undefined) + '\n';
}

export async function writeExportResult(
  result: ExportPassResult,
  path: string,
  options: ResultFormatOptions = {}
): Promise<void> {
  await writeFile(path, formatExportResult(result, options), 'utf-8');
}
