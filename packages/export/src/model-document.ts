/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * JSON model document - levels, plan views and elements of a host model
 *
 * {
 *   "unit": "ft",
 *   "levels": [{ "id": 1, "name": "Level 1", "elevation": 0, "upToLevelId": 2 }],
 *   "views": [{ "id": 100, "name": "Level 1", "viewType": "FloorPlan", "genLevelId": 1 }],
 *   "elements": [{
 *     "id": 10, "kind": "wall", "levelId": 1,
 *     "exportAs": { "exportInstance": "IfcWall", "exportType": "IfcWallType" },
 *     "parameters": { "WALL_BASE_CONSTRAINT": { "storageType": "element-id", "value": 1 } },
 *     "boundingBox": { "min": [0, 0, 0], "max": [5, 0.2, 12] }
 *   }]
 * }
 */

import { ELEMENT_KINDS, INVALID_ELEMENT_ID, isLengthUnit } from '@storey-split/data';
import type {
  BoundingBox,
  ElementKind,
  ExportTypePair,
  LengthUnit,
  Level,
  ModelElement,
  ParameterValue,
  PlanView,
  Vec3,
  ViewType,
} from '@storey-split/data';
import { ModelDocumentError } from './errors.js';

export interface ModelDocument {
  unit?: LengthUnit;
  levels: Level[];
  views: PlanView[];
  elements: ModelElement[];
}

const VIEW_TYPES: readonly ViewType[] = ['FloorPlan', 'CeilingPlan', 'EngineeringPlan', 'AreaPlan', 'Section', 'ThreeD'];

// ============================================================================
// Field readers
// ============================================================================

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRecord(value: unknown, path: string): JsonRecord {
  if (!isRecord(value)) throw new ModelDocumentError('expected an object', path);
  return value;
}

function readArray(value: unknown, path: string): unknown[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new ModelDocumentError('expected an array', path);
  return value;
}

function readNumber(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ModelDocumentError('expected a finite number', path);
  }
  return value;
}

function readId(value: unknown, path: string): number {
  const id = readNumber(value, path);
  if (!Number.isInteger(id)) throw new ModelDocumentError('expected an integer id', path);
  return id;
}

function readOptionalId(value: unknown, path: string): number | undefined {
  return value === undefined || value === null ? undefined : readId(value, path);
}

function readString(value: unknown, path: string): string {
  if (typeof value !== 'string') throw new ModelDocumentError('expected a string', path);
  return value;
}

function readOptionalBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new ModelDocumentError('expected a boolean', path);
  return value;
}

function readVec3(value: unknown, path: string): Vec3 {
  if (!Array.isArray(value) || value.length !== 3) {
    throw new ModelDocumentError('expected [x, y, z]', path);
  }
  return [readNumber(value[0], `${path}[0]`), readNumber(value[1], `${path}[1]`), readNumber(value[2], `${path}[2]`)];
}

// ============================================================================
// Entities
// ============================================================================

function parseLevel(value: unknown, path: string): Level {
  const record = readRecord(value, path);
  const id = readId(record.id, `${path}.id`);
  return {
    id,
    name: record.name === undefined ? `Level ${id}` : readString(record.name, `${path}.name`),
    elevation: readNumber(record.elevation, `${path}.elevation`),
    isBuildingStory: readOptionalBoolean(record.isBuildingStory, `${path}.isBuildingStory`),
    upToLevelId: readOptionalId(record.upToLevelId, `${path}.upToLevelId`),
  };
}

function parseView(value: unknown, path: string): PlanView {
  const record = readRecord(value, path);
  const id = readId(record.id, `${path}.id`);
  const viewType = readString(record.viewType, `${path}.viewType`);
  const knownType = VIEW_TYPES.find((type) => type === viewType);
  if (!knownType) throw new ModelDocumentError(`unknown view type "${viewType}"`, `${path}.viewType`);
  return {
    id,
    name: record.name === undefined ? `View ${id}` : readString(record.name, `${path}.name`),
    viewType: knownType,
    genLevelId: readOptionalId(record.genLevelId, `${path}.genLevelId`),
    bottomClipPlaneLevelId: readOptionalId(record.bottomClipPlaneLevelId, `${path}.bottomClipPlaneLevelId`),
  };
}

function parseParameter(value: unknown, path: string): ParameterValue {
  const record = readRecord(value, path);
  const storageType = readString(record.storageType, `${path}.storageType`);
  switch (storageType) {
    case 'element-id':
      return { storageType, value: readId(record.value, `${path}.value`) };
    case 'double':
      return { storageType, value: readNumber(record.value, `${path}.value`) };
    case 'integer':
      return { storageType, value: readId(record.value, `${path}.value`) };
    case 'string':
      return { storageType, value: readString(record.value, `${path}.value`) };
    default:
      throw new ModelDocumentError(`unknown storage type "${storageType}"`, `${path}.storageType`);
  }
}

function parseParameters(value: unknown, path: string): Map<string, ParameterValue> {
  const parameters = new Map<string, ParameterValue>();
  if (value === undefined) return parameters;
  for (const [name, parameter] of Object.entries(readRecord(value, path))) {
    parameters.set(name, parseParameter(parameter, `${path}.${name}`));
  }
  return parameters;
}

function parseExportAs(value: unknown, path: string): ExportTypePair {
  const record = readRecord(value, path);
  return {
    exportInstance: readString(record.exportInstance, `${path}.exportInstance`),
    exportType: record.exportType === undefined ? '' : readString(record.exportType, `${path}.exportType`),
  };
}

function parseBoundingBox(value: unknown, path: string): BoundingBox | undefined {
  if (value === undefined || value === null) return undefined;
  const record = readRecord(value, path);
  return { min: readVec3(record.min, `${path}.min`), max: readVec3(record.max, `${path}.max`) };
}

function parseElement(value: unknown, path: string): ModelElement {
  const record = readRecord(value, path);
  const kindName = readString(record.kind, `${path}.kind`);
  const kind: ElementKind | undefined = ELEMENT_KINDS.find((k) => k === kindName);
  if (!kind) throw new ModelDocumentError(`unknown element kind "${kindName}"`, `${path}.kind`);

  const base = {
    id: readId(record.id, `${path}.id`),
    levelId: readOptionalId(record.levelId, `${path}.levelId`) ?? INVALID_ELEMENT_ID,
    exportAs: parseExportAs(record.exportAs, `${path}.exportAs`),
    parameters: parseParameters(record.parameters, `${path}.parameters`),
    boundingBox: parseBoundingBox(record.boundingBox, `${path}.boundingBox`),
    viewSpecific: readOptionalBoolean(record.viewSpecific, `${path}.viewSpecific`),
    ownerViewId: readOptionalId(record.ownerViewId, `${path}.ownerViewId`),
  };

  switch (kind) {
    case 'family-instance':
      return { ...base, kind, superComponentId: readOptionalId(record.superComponentId, `${path}.superComponentId`) };
    case 'mep-curve':
      return { ...base, kind, referenceLevelId: readOptionalId(record.referenceLevelId, `${path}.referenceLevelId`) };
    case 'wall':
    case 'stairs':
    case 'truss':
    case 'extrusion-roof':
    case 'generic':
      return { ...base, kind };
  }
}

function assertUniqueIds(items: ReadonlyArray<{ id: number }>, path: string): void {
  const seen = new Set<number>();
  items.forEach((item, index) => {
    if (seen.has(item.id)) {
      throw new ModelDocumentError(`duplicate id ${item.id}`, `${path}[${index}].id`);
    }
    seen.add(item.id);
  });
}

/**
 * Validates a parsed JSON value and converts it into model entities
 */
export function parseModelDocument(input: unknown): ModelDocument {
  const record = readRecord(input, '$');

  let unit: LengthUnit | undefined;
  if (record.unit !== undefined) {
    const unitName = readString(record.unit, 'unit');
    if (!isLengthUnit(unitName)) throw new ModelDocumentError(`unsupported unit "${unitName}"`, 'unit');
    unit = unitName;
  }

  const levels = readArray(record.levels, 'levels').map((value, i) => parseLevel(value, `levels[${i}]`));
  const views = readArray(record.views, 'views').map((value, i) => parseView(value, `views[${i}]`));
  const elements = readArray(record.elements, 'elements').map((value, i) => parseElement(value, `elements[${i}]`));

  assertUniqueIds(levels, 'levels');
  assertUniqueIds(views, 'views');
  assertUniqueIds(elements, 'elements');

  return { unit, levels, views, elements };
}

/**
 * Parses JSON text into a model document
 */
export function parseModelDocumentText(text: string): ModelDocument {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ModelDocumentError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
  return parseModelDocument(json);
}
