/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Core types shared by the level and export packages
 */

// ============================================================================
// Identities
// ============================================================================

/** Stable integer identity of a host model element (levels and views included) */
export type ElementId = number;

/** Sentinel for "no element" / "invalid" */
export const INVALID_ELEMENT_ID: ElementId = -1;

export function isValidElementId(id: ElementId | undefined): id is ElementId {
  return id !== undefined && id !== INVALID_ELEMENT_ID;
}

// ============================================================================
// Geometry
// ============================================================================

export type Vec3 = [number, number, number];

/** Axis-aligned bounding box in model coordinates */
export interface BoundingBox {
  min: Vec3;
  max: Vec3;
}

// ============================================================================
// Levels and views
// ============================================================================

export interface Level {
  id: ElementId;
  name: string;
  /** Elevation in model length units */
  elevation: number;
  /** "Building Story" flag; undefined when the model does not carry it */
  isBuildingStory?: boolean;
  /** "Continues up to level" attribute, if set */
  upToLevelId?: ElementId;
}

export type ViewType = 'FloorPlan' | 'CeilingPlan' | 'EngineeringPlan' | 'AreaPlan' | 'Section' | 'ThreeD';

export interface PlanView {
  id: ElementId;
  name: string;
  viewType: ViewType;
  /** Level that generated the view */
  genLevelId?: ElementId;
  /** Level of the view range's bottom clip plane */
  bottomClipPlaneLevelId?: ElementId;
}

// ============================================================================
// Parameters
// ============================================================================

export type ParameterValue =
  | { storageType: 'element-id'; value: ElementId }
  | { storageType: 'double'; value: number }
  | { storageType: 'integer'; value: number }
  | { storageType: 'string'; value: string };

/** Built-in parameters that may name an element's base level */
export type LevelParameterName =
  | 'WALL_BASE_CONSTRAINT'
  | 'FAMILY_BASE_LEVEL_PARAM'
  | 'INSTANCE_SCHEDULE_ONLY_LEVEL_PARAM'
  | 'INSTANCE_REFERENCE_LEVEL_PARAM'
  | 'TRUSS_ELEMENT_REFERENCE_LEVEL_PARAM'
  | 'STAIRS_BASE_LEVEL_PARAM'
  | 'ROOF_CONSTRAINT_LEVEL_PARAM';

// ============================================================================
// Elements
// ============================================================================

/** Entity/type pair the element is exported as, e.g. IfcColumn / IfcColumnType */
export interface ExportTypePair {
  exportInstance: string;
  exportType: string;
}

interface ElementBase {
  id: ElementId;
  /** Generic level attribute; may be INVALID_ELEMENT_ID */
  levelId: ElementId;
  exportAs: ExportTypePair;
  parameters: ReadonlyMap<string, ParameterValue>;
  boundingBox?: BoundingBox;
  /** Element is drawn in a single 2D view */
  viewSpecific?: boolean;
  ownerViewId?: ElementId;
}

export interface WallElement extends ElementBase {
  kind: 'wall';
}

export interface FamilyInstanceElement extends ElementBase {
  kind: 'family-instance';
  /** Containing instance when this one is nested */
  superComponentId?: ElementId;
}

export interface TrussElement extends ElementBase {
  kind: 'truss';
}

export interface StairsElement extends ElementBase {
  kind: 'stairs';
}

export interface ExtrusionRoofElement extends ElementBase {
  kind: 'extrusion-roof';
}

/** Pipe, duct or cable run */
export interface MepCurveElement extends ElementBase {
  kind: 'mep-curve';
  referenceLevelId?: ElementId;
}

export interface GenericElement extends ElementBase {
  kind: 'generic';
}

export type ModelElement =
  | WallElement
  | FamilyInstanceElement
  | TrussElement
  | StairsElement
  | ExtrusionRoofElement
  | MepCurveElement
  | GenericElement;

export type ElementKind = ModelElement['kind'];

export const ELEMENT_KINDS: readonly ElementKind[] = [
  'wall',
  'family-instance',
  'truss',
  'stairs',
  'extrusion-roof',
  'mep-curve',
  'generic',
];

// ============================================================================
// Host model
// ============================================================================

/**
 * Read-only model queries the export relies on.
 * Failures thrown by an implementation propagate to the caller unchanged.
 */
export interface HostModel {
  getLevels(): readonly Level[];
  getLevel(id: ElementId): Level | undefined;
  getElement(id: ElementId): ModelElement | undefined;
  getElements(): readonly ModelElement[];
  getViews(): readonly PlanView[];
}
