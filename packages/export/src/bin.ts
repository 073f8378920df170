/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createProgram } from './cli.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('\n❌ Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
