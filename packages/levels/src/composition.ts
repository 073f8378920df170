/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ModelElement } from '@storey-split/data';

export type ElementCompositionType = 'complex' | 'element' | 'partial';

/** Parameter a user sets to override the composition type of an element */
export const COMPOSITION_OVERRIDE_PARAMETER = 'IfcElementCompositionType';

const COMPOSITION_TYPES: readonly ElementCompositionType[] = ['complex', 'element', 'partial'];

function isCompositionType(value: string): value is ElementCompositionType {
  return (COMPOSITION_TYPES as readonly string[]).includes(value);
}

/**
 * Composition type of an element, `element` unless overridden (case-insensitive)
 */
export function getElementCompositionTypeOverride(element: ModelElement): ElementCompositionType {
  const parameter = element.parameters.get(COMPOSITION_OVERRIDE_PARAMETER);
  if (parameter?.storageType !== 'string') return 'element';

  const value = parameter.value.trim().toLowerCase();
  return isCompositionType(value) ? value : 'element';
}
