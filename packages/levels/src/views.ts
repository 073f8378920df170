/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Plan views generated by levels
 */

import { isValidElementId } from '@storey-split/data';
import type { ElementId, HostModel, Level, PlanView, ViewType } from '@storey-split/data';

export function isViewGeneratedByLevel(view: PlanView, level: Level): boolean {
  return isValidElementId(view.genLevelId) && view.genLevelId === level.id;
}

/**
 * One representative view of the given type per level.
 *
 * A view whose bottom clip plane sits on its generating level is preferred;
 * otherwise any view generated by the level is used. Levels without a view map
 * to undefined. Returns undefined for an empty level list.
 */
export function findViewsForLevels(
  model: HostModel,
  viewType: ViewType,
  levels: readonly Level[]
): Map<ElementId, ElementId | undefined> | undefined {
  if (levels.length === 0) return undefined;

  const viewsForLevels = new Map<ElementId, ElementId | undefined>();
  const possibleViewsForLevels = new Map<ElementId, ElementId>();
  const levelsToFind = new Set<ElementId>(levels.map((level) => level.id));

  for (const view of model.getViews()) {
    if (view.viewType !== viewType) continue;

    const genLevelId = view.genLevelId;
    if (!isValidElementId(genLevelId) || !levelsToFind.has(genLevelId)) continue;

    if (view.bottomClipPlaneLevelId !== genLevelId) {
      possibleViewsForLevels.set(genLevelId, view.id);
      continue;
    }

    viewsForLevels.set(genLevelId, view.id);
    levelsToFind.delete(genLevelId);
  }

  for (const levelId of levelsToFind) {
    viewsForLevels.set(levelId, possibleViewsForLevels.get(levelId));
  }

  return viewsForLevels;
}

/**
 * Inverts a level-to-view map into the view-to-level map the base-level resolver uses
 */
export function viewLevelMap(
  viewsForLevels: ReadonlyMap<ElementId, ElementId | undefined> | undefined
): Map<ElementId, ElementId> {
  const viewLevels = new Map<ElementId, ElementId>();
  if (!viewsForLevels) return viewLevels;
  for (const [levelId, viewId] of viewsForLevels) {
    if (viewId !== undefined) viewLevels.set(viewId, levelId);
  }
  return viewLevels;
}
