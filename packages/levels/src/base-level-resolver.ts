/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Base-level resolver - finds the level an element is anchored to
 *
 * Resolution order:
 * 1. view-specific elements take the level of their owner view
 * 2. kind-specific level parameters, in priority order
 * 3. the reference level of pipes, ducts and cable runs
 * 4. the element's own level attribute (possibly INVALID_ELEMENT_ID)
 */

import { isValidElementId } from '@storey-split/data';
import type { ElementId, HostModel, LevelParameterName, ModelElement } from '@storey-split/data';

export interface BaseLevelContext {
  model: HostModel;
  /** Level associated with each exported plan view, keyed by view id */
  viewLevels: ReadonlyMap<ElementId, ElementId>;
}

/** Where to look for a base level parameter, and which ones */
export interface LevelParameterSearch {
  source: ModelElement;
  parameters: readonly LevelParameterName[];
}

const WALL_PARAMETERS: readonly LevelParameterName[] = ['WALL_BASE_CONSTRAINT'];

// In-place base level first, then the two schedule-level parameters of loadable families.
const FAMILY_INSTANCE_PARAMETERS: readonly LevelParameterName[] = [
  'FAMILY_BASE_LEVEL_PARAM',
  'INSTANCE_SCHEDULE_ONLY_LEVEL_PARAM',
  'INSTANCE_REFERENCE_LEVEL_PARAM',
];

const TRUSS_PARAMETERS: readonly LevelParameterName[] = ['TRUSS_ELEMENT_REFERENCE_LEVEL_PARAM'];
const STAIRS_PARAMETERS: readonly LevelParameterName[] = ['STAIRS_BASE_LEVEL_PARAM'];
const ROOF_PARAMETERS: readonly LevelParameterName[] = ['ROOF_CONSTRAINT_LEVEL_PARAM'];

/**
 * Outermost instance a nested family instance belongs to, or the instance itself
 */
export function topLevelComponent(element: ModelElement, model: HostModel): ModelElement {
  let current = element;
  const visited = new Set<ElementId>([element.id]);
  while (current.kind === 'family-instance' && isValidElementId(current.superComponentId)) {
    const parent = model.getElement(current.superComponentId);
    if (!parent || visited.has(parent.id)) break;
    visited.add(parent.id);
    current = parent;
  }
  return current;
}

export function baseLevelParametersFor(element: ModelElement, model: HostModel): LevelParameterSearch {
  switch (element.kind) {
    case 'wall':
      return { source: element, parameters: WALL_PARAMETERS };
    case 'family-instance':
      return { source: topLevelComponent(element, model), parameters: FAMILY_INSTANCE_PARAMETERS };
    case 'truss':
      return { source: element, parameters: TRUSS_PARAMETERS };
    case 'stairs':
      return { source: element, parameters: STAIRS_PARAMETERS };
    case 'extrusion-roof':
      return { source: element, parameters: ROOF_PARAMETERS };
    case 'mep-curve':
    case 'generic':
      return { source: element, parameters: [] };
  }
}

/**
 * First parameter that exists, stores an element id and holds a valid one
 */
export function firstValidLevelParameter(search: LevelParameterSearch): ElementId | undefined {
  for (const name of search.parameters) {
    const parameter = search.source.parameters.get(name);
    if (parameter?.storageType === 'element-id' && isValidElementId(parameter.value)) {
      return parameter.value;
    }
  }
  return undefined;
}

/**
 * Level id anchoring the element. Never throws for missing data; callers treat
 * INVALID_ELEMENT_ID as "no base level known".
 */
export function resolveBaseLevel(element: ModelElement, context: BaseLevelContext): ElementId {
  if (element.viewSpecific && element.ownerViewId !== undefined) {
    const viewLevelId = context.viewLevels.get(element.ownerViewId);
    if (viewLevelId !== undefined) return viewLevelId;
  }

  const fromParameter = firstValidLevelParameter(baseLevelParametersFor(element, context.model));
  if (fromParameter !== undefined) return fromParameter;

  if (element.kind === 'mep-curve' && isValidElementId(element.referenceLevelId)) {
    if (context.model.getLevel(element.referenceLevelId)) return element.referenceLevelId;
  }

  return element.levelId;
}
