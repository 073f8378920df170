/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import {
  buildingStoriesByElevation,
  compareLevelsByElevation,
  findAllLevels,
  isBuildingStory,
  sortLevelsByElevation,
} from './level-catalog.js';
import { FixtureModel, level } from '../test/model-fixtures.js';

describe('sortLevelsByElevation', () => {
  it('orders by elevation, then by id for equal elevations', () => {
    const levels = [level(5, 0), level(3, 0), level(1, 10), level(9, -3)];
    expect(sortLevelsByElevation(levels).map((l) => l.id)).toEqual([9, 3, 5, 1]);
  });

  it('does not reorder the input', () => {
    const levels = [level(2, 10), level(1, 0)];
    sortLevelsByElevation(levels);
    expect(levels.map((l) => l.id)).toEqual([2, 1]);
  });

  it('treats a level as equal to itself', () => {
    const a = level(4, 3);
    expect(compareLevelsByElevation(a, a)).toBe(0);
    expect(compareLevelsByElevation(a, level(4, 3))).toBe(0);
  });
});

describe('findAllLevels', () => {
  it('returns every level of the model, lowest first', () => {
    const model = new FixtureModel([level(1, 6), level(2, -1, { isBuildingStory: false }), level(3, 3)]);
    expect(findAllLevels(model).map((l) => l.id)).toEqual([2, 3, 1]);
  });

  it('lets model failures through', () => {
    const model = new FixtureModel([]);
    model.getLevels = () => {
      throw new Error('model unreadable');
    };
    expect(() => findAllLevels(model)).toThrow('model unreadable');
  });
});

describe('isBuildingStory', () => {
  it('defaults to true when the flag is absent', () => {
    expect(isBuildingStory(level(1, 0))).toBe(true);
  });

  it('follows the flag when present', () => {
    expect(isBuildingStory(level(1, 0, { isBuildingStory: false }))).toBe(false);
    expect(isBuildingStory(level(1, 0, { isBuildingStory: true }))).toBe(true);
  });

  it('is false for a missing level', () => {
    expect(isBuildingStory(undefined)).toBe(false);
  });
});

describe('buildingStoriesByElevation', () => {
  it('keeps only building stories in catalog order', () => {
    const model = new FixtureModel([
      level(10, 20),
      level(11, 0),
      level(12, 4, { isBuildingStory: false }),
      level(13, 10),
      level(14, 10),
    ]);
    expect(buildingStoriesByElevation(model)).toEqual([11, 13, 14, 10]);
  });
});
