/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const TOWER_MODEL_PATH = path.resolve(__dirname, 'fixtures', 'tower.json');

export function readTowerModel(): string {
  return fs.readFileSync(TOWER_MODEL_PATH, 'utf-8');
}
