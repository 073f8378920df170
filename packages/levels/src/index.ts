/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @storey-split/levels - Level catalog, level-info cache, base levels and level-based range splitting
 */

// Types
export type { BelowBaseLevelMode, SegmentationOptions, SegmentationContext, LevelRanges } from './types.js';

// Level catalog
export {
  compareLevelsByElevation,
  sortLevelsByElevation,
  findAllLevels,
  isBuildingStory,
  buildingStoriesByElevation,
} from './level-catalog.js';

// Level-info cache
export { LevelInfoCache, UNKNOWN_HEIGHT } from './level-info-cache.js';
export type { LevelInfo } from './level-info-cache.js';
export { calculateDistanceToNextLevel } from './level-height.js';

// Base levels
export {
  resolveBaseLevel,
  baseLevelParametersFor,
  firstValidLevelParameter,
  topLevelComponent,
} from './base-level-resolver.js';
export type { BaseLevelContext, LevelParameterSearch } from './base-level-resolver.js';

// Range segmentation
export {
  createSplitLevelRangesForElement,
  segmentElement,
  segmentVerticalRange,
  stepLevel,
  initialSegmentationState,
  isSplitByLevelExportType,
} from './level-ranges.js';
export type { SegmentationState } from './level-ranges.js';

// Views and composition
export { findViewsForLevels, isViewGeneratedByLevel, viewLevelMap } from './views.js';
export { getElementCompositionTypeOverride, COMPOSITION_OVERRIDE_PARAMETER } from './composition.js';
export type { ElementCompositionType } from './composition.js';
