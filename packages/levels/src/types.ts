/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ElementId, VerticalRange } from '@storey-split/data';
import type { BaseLevelContext } from './base-level-resolver.js';
import type { LevelInfoCache } from './level-info-cache.js';

/**
 * What happens to the part of an element below its base level:
 * - 'clip': the first fragment starts at the base level's elevation
 * - 'include': the part below stays in the first fragment
 */
export type BelowBaseLevelMode = 'clip' | 'include';

export interface SegmentationOptions {
  /** Split columns, walls and duct segments by level */
  splitElementsByLevel: boolean;
  /** Overflow allowed past a level boundary, in model units */
  levelExtension: number;
  belowBaseLevel: BelowBaseLevelMode;
}

export interface SegmentationContext extends BaseLevelContext {
  cache: LevelInfoCache;
  options: SegmentationOptions;
}

/** Levels and ranges, paired by index */
export interface LevelRanges {
  levels: ElementId[];
  ranges: VerticalRange[];
}
