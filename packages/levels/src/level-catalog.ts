/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Level catalog - levels ordered by elevation
 */

import type { ElementId, HostModel, Level } from '@storey-split/data';

/**
 * Orders levels by ascending elevation. Levels at exactly the same elevation
 * are ordered by ascending id so the order is total and repeatable.
 */
export function compareLevelsByElevation(a: Level, b: Level): number {
  if (a.id === b.id) return 0;
  if (a.elevation === b.elevation) return a.id > b.id ? 1 : -1;
  return a.elevation > b.elevation ? 1 : -1;
}

export function sortLevelsByElevation(levels: readonly Level[]): Level[] {
  return [...levels].sort(compareLevelsByElevation);
}

/**
 * All levels of the model, lowest first
 */
export function findAllLevels(model: HostModel): Level[] {
  return sortLevelsByElevation(model.getLevels());
}

/**
 * A level counts as a building story unless it explicitly says otherwise
 */
export function isBuildingStory(level: Level | undefined): boolean {
  if (!level) return false;
  return level.isBuildingStory ?? true;
}

/**
 * Ids of the building stories of the model, lowest first
 */
export function buildingStoriesByElevation(model: HostModel): ElementId[] {
  return findAllLevels(model)
    .filter((level) => isBuildingStory(level))
    .map((level) => level.id);
}
