/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Export pass - splits the model's elements by building story
 *
 * A pass owns the level-info cache: every element segmented through the same
 * pass sees the same level heights. `reset()` starts a new pass.
 */

import { createLogger } from '@storey-split/data';
import type { ElementId, HostModel, Level, ModelElement, VerticalRange } from '@storey-split/data';
import {
  createSplitLevelRangesForElement,
  findAllLevels,
  findViewsForLevels,
  getElementCompositionTypeOverride,
  isBuildingStory,
  LevelInfoCache,
  resolveBaseLevel,
  viewLevelMap,
} from '@storey-split/levels';
import type { ElementCompositionType, LevelRanges, SegmentationContext } from '@storey-split/levels';
import { resolveExportOptions, toSegmentationOptions } from './export-options.js';
import type { ExportOptions } from './export-options.js';

const log = createLogger('ExportPass');

export interface LevelFragment {
  levelId: ElementId;
  levelName: string;
  range: VerticalRange;
}

export interface ElementFragments {
  elementId: ElementId;
  baseLevelId: ElementId;
  compositionType: ElementCompositionType;
  /** Empty when the element is exported whole */
  fragments: LevelFragment[];
}

export interface ElementFailure {
  elementId: ElementId;
  message: string;
}

export interface ExportPassResult {
  levelExtension: number;
  buildingStories: ElementId[];
  elements: ElementFragments[];
  failures: ElementFailure[];
}

export class ExportPass {
  readonly options: ExportOptions;
  readonly cache: LevelInfoCache;
  private readonly context: SegmentationContext;

  constructor(
    private readonly model: HostModel,
    options: Partial<ExportOptions> = {}
  ) {
    this.options = resolveExportOptions(options);
    this.cache = new LevelInfoCache(model);

    const stories = this.buildingStories();
    this.context = {
      model,
      cache: this.cache,
      viewLevels: viewLevelMap(findViewsForLevels(model, 'FloorPlan', stories)),
      options: toSegmentationOptions(this.options),
    };
    this.seedDefaultHeights(stories);
  }

  /** View-to-level map used for view-specific elements */
  get viewLevels(): ReadonlyMap<ElementId, ElementId> {
    return this.context.viewLevels;
  }

  baseLevelOf(element: ModelElement): ElementId {
    return resolveBaseLevel(element, this.context);
  }

  /**
   * Levels and ranges of one element; model failures propagate
   */
  segment(element: ModelElement): LevelRanges {
    return createSplitLevelRangesForElement(element, this.context);
  }

  /**
   * Segments every element (by default all elements of the model)
   */
  run(elements: readonly ModelElement[] = this.model.getElements()): ExportPassResult {
    const result: ExportPassResult = {
      levelExtension: this.context.options.levelExtension,
      buildingStories: [...this.cache.buildingStoriesByElevation],
      elements: [],
      failures: [],
    };

    for (const element of elements) {
      try {
        result.elements.push(this.describe(element));
      } catch (error) {
        if (!this.options.continueOnError) throw error;
        log.error('Segmentation failed', error, { operation: 'run', elementId: element.id });
        result.failures.push({
          elementId: element.id,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const split = result.elements.filter((entry) => entry.fragments.length > 0).length;
    log.info(`Split ${split} of ${elements.length} element(s)`, {
      operation: 'run',
      data: { failures: result.failures.length, levelsCached: this.cache.size },
    });
    return result;
  }

  /**
   * Drops cached level data; the next segmentation starts a new pass
   */
  reset(): void {
    this.cache.clear();
    this.seedDefaultHeights(this.buildingStories());
  }

  private describe(element: ModelElement): ElementFragments {
    const { levels, ranges } = this.segment(element);
    return {
      elementId: element.id,
      baseLevelId: this.baseLevelOf(element),
      compositionType: getElementCompositionTypeOverride(element),
      fragments: levels.map((levelId, i) => ({
        levelId,
        levelName: this.model.getLevel(levelId)?.name ?? '',
        range: ranges[i],
      })),
    };
  }

  private buildingStories(): Level[] {
    return findAllLevels(this.model).filter((level) => isBuildingStory(level));
  }

  /**
   * With deriveDefaultHeights, a story's default height is the distance to the next story
   */
  private seedDefaultHeights(stories: readonly Level[]): void {
    if (!this.options.deriveDefaultHeights) return;
    for (let i = 0; i + 1 < stories.length; i++) {
      const height = stories[i + 1].elevation - stories[i].elevation;
      if (height > 0) this.cache.setDefaultHeight(stories[i].id, height);
    }
  }
}
