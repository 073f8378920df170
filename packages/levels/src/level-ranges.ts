/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Level-based range segmentation
 *
 * Splits the vertical extent of a column, wall or duct segment into
 * non-overlapping ranges, one per building story it passes through. Walks the
 * building stories once, lowest first, starting at the element's base level.
 * A level whose "up to level" attribute names a higher story makes the walk
 * jump straight to that story.
 */

import {
  createLogger,
  INVALID_ELEMENT_ID,
  isAlmostZero,
  isValidElementId,
  VerticalRangeUtils,
} from '@storey-split/data';
import type { ElementId, ExportTypePair, ModelElement, VerticalRange } from '@storey-split/data';
import { resolveBaseLevel } from './base-level-resolver.js';
import { calculateDistanceToNextLevel } from './level-height.js';
import type { LevelRanges, SegmentationContext } from './types.js';

const log = createLogger('LevelRanges');

const SPLIT_INSTANCE_ENTITIES = new Set(['IfcColumn', 'IfcWall']);
const SPLIT_TYPE_ENTITIES = new Set(['IfcDuctSegmentType']);

/**
 * Whether elements exported as this entity/type pair are split by level
 */
export function isSplitByLevelExportType(exportAs: ExportTypePair): boolean {
  return SPLIT_INSTANCE_ENTITIES.has(exportAs.exportInstance) || SPLIT_TYPE_ENTITIES.has(exportAs.exportType);
}

/** Walk state carried from one building story to the next */
export interface SegmentationState {
  firstLevelId: ElementId;
  /** The base level (or the first story, without one) has been reached */
  foundFirstLevel: boolean;
  /** Story the previous level's height reaches; others are skipped until then */
  skipToNextLevel: ElementId;
  levels: ElementId[];
  ranges: VerticalRange[];
  /** The last fragment has been produced */
  done: boolean;
}

export function initialSegmentationState(firstLevelId: ElementId): SegmentationState {
  return {
    firstLevelId,
    foundFirstLevel: !isValidElementId(firstLevelId),
    skipToNextLevel: INVALID_ELEMENT_ID,
    levels: [],
    ranges: [],
    done: false,
  };
}

function emptyLevelRanges(): LevelRanges {
  return { levels: [], ranges: [] };
}

/**
 * Moves the candidate start past the previous fragment. Returns undefined when
 * nothing of the candidate is left above the previous fragment.
 */
function placeAfter(
  previous: VerticalRange | undefined,
  candidate: VerticalRange,
  extension: number
): VerticalRange | undefined {
  let start = candidate.start;
  if (previous) {
    if (previous.end >= candidate.end - extension) return undefined;
    start = Math.max(start, previous.end);
  }
  if (!(start < candidate.end)) return undefined;
  return { start, end: candidate.end };
}

/**
 * Advances the walk by one building story
 */
export function stepLevel(
  state: SegmentationState,
  levelId: ElementId,
  zSpan: VerticalRange,
  context: SegmentationContext
): SegmentationState {
  const { cache, model, options } = context;
  const extension = options.levelExtension;

  if (!state.foundFirstLevel) {
    if (levelId !== state.firstLevelId) return state;
    state = { ...state, foundFirstLevel: true };
  }

  if (isValidElementId(state.skipToNextLevel) && levelId !== state.skipToNextLevel) {
    return state;
  }

  const levelInfo = cache.getLevelInfo(levelId);
  if (!levelInfo) return state;

  // Span ends below this level.
  if (zSpan.end < levelInfo.elevation + extension) return state;

  let height = cache.findHeight(levelId);
  if (height < 0) {
    height = calculateDistanceToNextLevel(model, levelId, cache);
  }
  state = { ...state, skipToNextLevel: cache.findNextLevel(levelId) };

  // A level without height reaches up indefinitely.
  const hasHeight = !isAlmostZero(height);

  // Span starts above this level.
  if (hasHeight && zSpan.start > levelInfo.elevation + height - extension) return state;

  const isFirstFragment = state.ranges.length === 0;
  const startsBelow = zSpan.start < levelInfo.elevation - extension;
  const startBelowLevel = !isFirstFragment && startsBelow;
  const endAboveLevel = hasHeight && zSpan.end > levelInfo.elevation + height + extension;
  const isBaseStory = isValidElementId(state.firstLevelId)
    ? levelId === state.firstLevelId
    : levelId === cache.buildingStoriesByElevation[0];
  // Only the part below the base story is clipped.
  const clipBelowBase = isFirstFragment && isBaseStory && startsBelow && options.belowBaseLevel === 'clip';
  const clipStart = startBelowLevel || clipBelowBase;

  const candidate: VerticalRange = {
    start: clipStart ? levelInfo.elevation : zSpan.start,
    end: endAboveLevel ? levelInfo.elevation + height : zSpan.end,
  };
  // Nothing left above this level's band: this is the last fragment.
  const done = !startBelowLevel && !endAboveLevel;

  const previous = isFirstFragment ? undefined : state.ranges[state.ranges.length - 1];
  const fragment = placeAfter(previous, candidate, extension);
  if (!fragment) {
    log.debug('Discarding fragment that does not extend past the previous one', candidate, {
      operation: 'stepLevel',
      levelId,
    });
    return { ...state, done };
  }

  return {
    ...state,
    levels: [...state.levels, levelId],
    ranges: [...state.ranges, fragment],
    done,
  };
}

/**
 * Splits a known vertical extent, starting the walk at `firstLevelId`
 * (or at the lowest story when it is INVALID_ELEMENT_ID)
 */
export function segmentVerticalRange(
  zSpan: VerticalRange,
  firstLevelId: ElementId,
  context: SegmentationContext
): LevelRanges {
  if (VerticalRangeUtils.isEmpty(zSpan)) return emptyLevelRanges();

  let state = initialSegmentationState(firstLevelId);
  for (const levelId of context.cache.buildingStoriesByElevation) {
    state = stepLevel(state, levelId, zSpan, context);
    if (state.done) break;
  }

  if (!state.foundFirstLevel) {
    log.debug('Base level is not a building story; element is not split', undefined, {
      operation: 'segment',
      levelId: firstLevelId,
    });
  }

  return { levels: state.levels, ranges: state.ranges };
}

/**
 * Level ranges for an element with the given vertical extent.
 * Empty when splitting is off or the element is not split by level.
 */
export function segmentElement(
  element: ModelElement,
  zSpan: VerticalRange,
  context: SegmentationContext
): LevelRanges {
  if (!context.options.splitElementsByLevel) return emptyLevelRanges();
  if (!isSplitByLevelExportType(element.exportAs)) return emptyLevelRanges();

  const firstLevelId = resolveBaseLevel(element, context);
  const result = segmentVerticalRange(zSpan, firstLevelId, context);
  log.debug(`Split into ${result.ranges.length} range(s)`, result.ranges, {
    operation: 'segment',
    elementId: element.id,
  });
  return result;
}

/**
 * Level ranges for an element, using the Z extent of its bounding box
 */
export function createSplitLevelRangesForElement(
  element: ModelElement,
  context: SegmentationContext
): LevelRanges {
  if (!element.boundingBox) return emptyLevelRanges();
  return segmentElement(element, VerticalRangeUtils.fromBoundingBox(element.boundingBox), context);
}
