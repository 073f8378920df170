/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { INVALID_ELEMENT_ID, VerticalRangeUtils } from '@storey-split/data';
import type { ModelElement } from '@storey-split/data';
import {
  createSplitLevelRangesForElement,
  initialSegmentationState,
  isSplitByLevelExportType,
  segmentElement,
  segmentVerticalRange,
  stepLevel,
} from './level-ranges.js';
import {
  BEAM,
  column,
  createContext,
  DUCT,
  FixtureModel,
  level,
  levelParam,
  TOLERANCE,
  WALL,
} from '../test/model-fixtures.js';

/** Stories at 0 and 10; the first reaches the second, the second has no height */
function twoStoryModel(): FixtureModel {
  return new FixtureModel([level(1, 0, { upToLevelId: 2 }), level(2, 10)]);
}

/** Stories at 0, 10, 20 and 30, each reaching the next */
function fourStoryModel(): FixtureModel {
  return new FixtureModel([
    level(1, 0, { upToLevelId: 2 }),
    level(2, 10, { upToLevelId: 3 }),
    level(3, 20, { upToLevelId: 4 }),
    level(4, 30),
  ]);
}

describe('isSplitByLevelExportType', () => {
  it('splits columns, walls and duct segment types', () => {
    expect(isSplitByLevelExportType({ exportInstance: 'IfcColumn', exportType: 'IfcColumnType' })).toBe(true);
    expect(isSplitByLevelExportType(WALL)).toBe(true);
    expect(isSplitByLevelExportType(DUCT)).toBe(true);
    expect(isSplitByLevelExportType(BEAM)).toBe(false);
  });
});

describe('segmentElement', () => {
  it('clips a span below a single story without height', () => {
    const model = new FixtureModel([level(1, 0)]);
    const element = column(10, { levelId: 1 });
    const result = segmentElement(element, { start: -1, end: 5 }, createContext(model));
    expect(result).toEqual({ levels: [1], ranges: [{ start: 0, end: 5 }] });
  });

  it('splits a span crossing two stories', () => {
    const element = column(10, { levelId: 1 });
    const result = segmentElement(element, { start: -2, end: 15 }, createContext(twoStoryModel()));
    expect(result.levels).toEqual([1, 2]);
    expect(result.ranges).toEqual([
      { start: 0, end: 10 },
      { start: 10, end: 15 },
    ]);
  });

  it('keeps the part below the base level when configured to', () => {
    const element = column(10, { levelId: 1 });
    const context = createContext(twoStoryModel(), { belowBaseLevel: 'include' });
    const result = segmentElement(element, { start: -2, end: 15 }, context);
    expect(result.ranges).toEqual([
      { start: -2, end: 10 },
      { start: 10, end: 15 },
    ]);
  });

  it('returns nothing when splitting is disabled', () => {
    const element = column(10, { levelId: 1 });
    const context = createContext(twoStoryModel(), { splitElementsByLevel: false });
    expect(segmentElement(element, { start: -2, end: 15 }, context)).toEqual({ levels: [], ranges: [] });
  });

  it('returns nothing for elements that are not split by level', () => {
    const element = column(10, { levelId: 1, exportAs: BEAM });
    expect(segmentElement(element, { start: -2, end: 15 }, createContext(twoStoryModel()))).toEqual({
      levels: [],
      ranges: [],
    });
  });

  it('returns the span unchanged when it fits inside one story', () => {
    const element = column(10, { levelId: 1 });
    const result = segmentElement(element, { start: 2, end: 8 }, createContext(twoStoryModel()));
    expect(result).toEqual({ levels: [1], ranges: [{ start: 2, end: 8 }] });
  });

  it('does not split an overflow within the tolerance', () => {
    const element = column(10, { levelId: 1 });
    const result = segmentElement(element, { start: -0.1, end: 10.1 }, createContext(twoStoryModel()));
    expect(result).toEqual({ levels: [1], ranges: [{ start: -0.1, end: 10.1 }] });
  });

  it('returns nothing for an empty span', () => {
    const element = column(10, { levelId: 1 });
    const context = createContext(twoStoryModel());
    expect(segmentElement(element, { start: 5, end: 5 }, context)).toEqual({ levels: [], ranges: [] });
    expect(segmentElement(element, { start: 6, end: 5 }, context)).toEqual({ levels: [], ranges: [] });
  });

  it('starts at the base level of the element', () => {
    const wall: ModelElement = {
      id: 11,
      kind: 'wall',
      levelId: 1,
      exportAs: WALL,
      parameters: new Map([['WALL_BASE_CONSTRAINT', levelParam(2)]]),
    };
    const result = segmentElement(wall, { start: 8, end: 25 }, createContext(fourStoryModel()));
    expect(result.levels).toEqual([2, 3]);
    expect(result.ranges).toEqual([
      { start: 10, end: 20 },
      { start: 20, end: 25 },
    ]);
  });

  it('starts at the lowest story without a base level', () => {
    const element = column(12, { levelId: INVALID_ELEMENT_ID });
    const result = segmentElement(element, { start: 5, end: 25 }, createContext(fourStoryModel()));
    expect(result.levels).toEqual([1, 2, 3]);
    expect(result.ranges).toEqual([
      { start: 5, end: 10 },
      { start: 10, end: 20 },
      { start: 20, end: 25 },
    ]);
  });

  it('skips stories the span starts above', () => {
    const element = column(13, { levelId: INVALID_ELEMENT_ID });
    const result = segmentElement(element, { start: 12, end: 18 }, createContext(twoStoryModel()));
    expect(result).toEqual({ levels: [2], ranges: [{ start: 12, end: 18 }] });
  });

  it('keeps the start of a span that begins above its base story', () => {
    const model = new FixtureModel([level(1, 0), level(2, 12)]);
    const context = createContext(model);
    context.cache.setDefaultHeight(1, 10);
    const element = column(19, { levelId: 1 });
    expect(segmentElement(element, { start: 11, end: 20 }, context)).toEqual({
      levels: [2],
      ranges: [{ start: 11, end: 20 }],
    });
  });

  it('returns nothing when the base level is not a building story', () => {
    const model = new FixtureModel([level(1, 0, { upToLevelId: 2 }), level(2, 10), level(3, 5, { isBuildingStory: false })]);
    const element = column(14, { levelId: 3 });
    expect(segmentElement(element, { start: 0, end: 15 }, createContext(model))).toEqual({ levels: [], ranges: [] });
  });

  it('jumps over stories inside an "up to level" band', () => {
    const model = new FixtureModel([
      level(1, 0, { upToLevelId: 3 }),
      level(2, 5),
      level(3, 10),
      level(4, 20),
    ]);
    const element = column(15, { levelId: 1 });
    const result = segmentElement(element, { start: 0, end: 20 }, createContext(model));
    expect(result.levels).toEqual([1, 3]);
    expect(result.ranges).toEqual([
      { start: 0, end: 10 },
      { start: 10, end: 20 },
    ]);
  });

  it('discards a fragment that ends below the previous one', () => {
    const model = new FixtureModel([level(1, 0), level(2, 3), level(3, 12)]);
    const context = createContext(model);
    context.cache.setDefaultHeight(1, 10);
    context.cache.setDefaultHeight(2, 2);
    const element = column(16, { levelId: 1 });
    const result = segmentElement(element, { start: 0, end: 20 }, context);
    expect(result.levels).toEqual([1, 3]);
    expect(result.ranges).toEqual([
      { start: 0, end: 10 },
      { start: 12, end: 20 },
    ]);
  });

  it('splits duct segments anchored on their reference level', () => {
    const duct: ModelElement = {
      id: 17,
      kind: 'mep-curve',
      levelId: 1,
      referenceLevelId: 2,
      exportAs: DUCT,
      parameters: new Map(),
    };
    const result = segmentElement(duct, { start: 9, end: 35 }, createContext(fourStoryModel()));
    expect(result.levels).toEqual([2, 3, 4]);
    expect(result.ranges).toEqual([
      { start: 10, end: 20 },
      { start: 20, end: 30 },
      { start: 30, end: 35 },
    ]);
  });

  it('gives the same result with a warm cache', () => {
    const element = column(18, { levelId: INVALID_ELEMENT_ID });
    const span = { start: -3, end: 27 };
    const warm = createContext(fourStoryModel());
    const first = segmentElement(element, span, warm);
    const second = segmentElement(element, span, warm);
    const cold = segmentElement(element, span, createContext(fourStoryModel()));
    expect(second).toEqual(first);
    expect(cold).toEqual(first);
    expect(JSON.stringify(second)).toBe(JSON.stringify(cold));
  });

  it('produces ordered, non-overlapping, non-empty ranges', () => {
    const model = new FixtureModel([
      level(1, 0, { upToLevelId: 3 }),
      level(2, 4),
      level(3, 9.95),
      level(4, 10),
      level(5, 22, { upToLevelId: 6 }),
      level(6, 22.05),
    ]);
    const spans = [
      { start: -5, end: 40 },
      { start: 3.9, end: 10.02 },
      { start: 9.9, end: 22.1 },
      { start: 0.05, end: 4.05 },
      { start: 21.9, end: 22.2 },
    ];
    for (const span of spans) {
      const context = createContext(model);
      context.cache.setDefaultHeight(4, 12);
      const result = segmentElement(column(19), span, context);
      expect(result.levels).toHaveLength(result.ranges.length);
      expect(VerticalRangeUtils.isMonotonic(result.ranges, TOLERANCE)).toBe(true);
      for (const range of result.ranges) {
        expect(range.start).toBeLessThan(range.end);
      }
    }
  });
});

describe('createSplitLevelRangesForElement', () => {
  it('uses the bounding box extent', () => {
    const element = column(20, { levelId: 1, zMin: -2, zMax: 15 });
    const result = createSplitLevelRangesForElement(element, createContext(twoStoryModel()));
    expect(result.ranges).toEqual([
      { start: 0, end: 10 },
      { start: 10, end: 15 },
    ]);
  });

  it('returns nothing without a bounding box', () => {
    const element: ModelElement = { ...column(21, { levelId: 1 }), boundingBox: undefined };
    expect(createSplitLevelRangesForElement(element, createContext(twoStoryModel()))).toEqual({
      levels: [],
      ranges: [],
    });
  });

  it('lets model failures through', () => {
    const model = twoStoryModel();
    model.getLevels = () => {
      throw new Error('model unreadable');
    };
    const element = column(22, { levelId: 1, zMin: 0, zMax: 15 });
    expect(() => createSplitLevelRangesForElement(element, createContext(model))).toThrow('model unreadable');
  });
});

describe('segmentVerticalRange', () => {
  it('walks from an explicit first level', () => {
    const result = segmentVerticalRange({ start: 15, end: 32 }, 2, createContext(fourStoryModel()));
    expect(result.levels).toEqual([2, 3, 4]);
    expect(result.ranges).toEqual([
      { start: 15, end: 20 },
      { start: 20, end: 30 },
      { start: 30, end: 32 },
    ]);
  });
});

describe('stepLevel', () => {
  it('starts at the first story without a base level', () => {
    const state = initialSegmentationState(INVALID_ELEMENT_ID);
    expect(state).toEqual({
      firstLevelId: INVALID_ELEMENT_ID,
      foundFirstLevel: true,
      skipToNextLevel: INVALID_ELEMENT_ID,
      levels: [],
      ranges: [],
      done: false,
    });
  });

  it('leaves the state untouched before the base level', () => {
    const state = initialSegmentationState(2);
    expect(stepLevel(state, 1, { start: 0, end: 15 }, createContext(twoStoryModel()))).toBe(state);
  });

  it('records the level its height reaches', () => {
    const context = createContext(twoStoryModel());
    const state = stepLevel(initialSegmentationState(1), 1, { start: 0, end: 15 }, context);
    expect(state.skipToNextLevel).toBe(2);
    expect(state.ranges).toEqual([{ start: 0, end: 10 }]);
    expect(state.done).toBe(false);

    const last = stepLevel(state, 2, { start: 0, end: 15 }, context);
    expect(last.ranges).toEqual([
      { start: 0, end: 10 },
      { start: 10, end: 15 },
    ]);
  });
});
