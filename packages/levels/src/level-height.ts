/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { INVALID_ELEMENT_ID, isValidElementId } from '@storey-split/data';
import type { ElementId, HostModel } from '@storey-split/data';
import { isBuildingStory } from './level-catalog.js';
import type { LevelInfoCache } from './level-info-cache.js';

/**
 * Distance from a level to the level named by its "up to level" attribute.
 *
 * Only a building story strictly above counts; otherwise the level's default
 * height is used, or 0. The result is registered in the cache and the height
 * the cache holds afterwards is returned.
 */
export function calculateDistanceToNextLevel(
  model: HostModel,
  levelId: ElementId,
  cache: LevelInfoCache
): number {
  let height = 0;
  let nextLevelId: ElementId = INVALID_ELEMENT_ID;

  const level = model.getLevel(levelId);
  if (level && isValidElementId(level.upToLevelId)) {
    const nextLevel = model.getLevel(level.upToLevelId);
    if (nextLevel && isBuildingStory(nextLevel)) {
      const netElevation = nextLevel.elevation - level.elevation;
      if (netElevation > 0) {
        height = netElevation;
        nextLevelId = nextLevel.id;
      }
    }
  }

  if (height <= 0) {
    height = cache.findDefaultHeight(levelId) ?? 0;
  }

  const info = cache.register(levelId, nextLevelId, height);
  return info ? info.heightToNextLevel : height;
}
