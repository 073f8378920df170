/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { BoundingBox } from './types.js';

/** Closed interval along the model's Z axis, start <= end */
export interface VerticalRange {
  start: number;
  end: number;
}

export const VerticalRangeUtils = {
  create(start: number, end: number): VerticalRange {
    if (Number.isNaN(start) || Number.isNaN(end)) {
      throw new RangeError(`Vertical range bounds must be numbers, got [${start}, ${end}]`);
    }
    if (start > end) {
      throw new RangeError(`Vertical range start ${start} is above its end ${end}`);
    }
    return { start, end };
  },

  /** Z extent of a bounding box; the box may be degenerate */
  fromBoundingBox(box: BoundingBox): VerticalRange {
    return { start: box.min[2], end: box.max[2] };
  },

  length(range: VerticalRange): number {
    return range.end - range.start;
  },

  isEmpty(range: VerticalRange): boolean {
    return !(range.start < range.end);
  },

  contains(range: VerticalRange, z: number, tolerance = 0): boolean {
    return z >= range.start - tolerance && z <= range.end + tolerance;
  },

  /**
   * True when consecutive ranges are ordered by start and overlap by at most `tolerance`
   */
  isMonotonic(ranges: readonly VerticalRange[], tolerance = 0): boolean {
    for (let i = 1; i < ranges.length; i++) {
      const prev = ranges[i - 1];
      const curr = ranges[i];
      if (curr.start < prev.start) return false;
      if (prev.end > curr.start + tolerance) return false;
    }
    return true;
  },
};
