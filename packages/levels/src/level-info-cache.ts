/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Level-info cache - derived per-level data for one export pass
 *
 * Entries are created lazily the first time a level is looked up and are
 * never dropped until `clear()`. Once a level has a known height, later
 * registrations for it are ignored so every element in the pass sees the
 * same value.
 */

import { createLogger, INVALID_ELEMENT_ID } from '@storey-split/data';
import type { ElementId, HostModel } from '@storey-split/data';
import { buildingStoriesByElevation } from './level-catalog.js';

const log = createLogger('LevelInfoCache');

/** Height placeholder for a level whose distance to the next level is not computed yet */
export const UNKNOWN_HEIGHT = -1;

export interface LevelInfo {
  levelId: ElementId;
  elevation: number;
  /** Distance to the next level, or UNKNOWN_HEIGHT */
  heightToNextLevel: number;
  /** Level the height reaches, or INVALID_ELEMENT_ID */
  nextLevelId: ElementId;
}

export class LevelInfoCache {
  private infos = new Map<ElementId, LevelInfo>();
  private defaultHeights = new Map<ElementId, number>();
  private stories: ElementId[] | null = null;

  constructor(private readonly model: HostModel) {}

  /**
   * Building story ids ordered by elevation, computed once per cache
   */
  get buildingStoriesByElevation(): readonly ElementId[] {
    if (this.stories === null) {
      this.stories = buildingStoriesByElevation(this.model);
    }
    return this.stories;
  }

  /** Number of levels with an entry */
  get size(): number {
    return this.infos.size;
  }

  /**
   * Entry for a level, created on first access. Undefined for ids the model does not know.
   */
  getLevelInfo(levelId: ElementId): Readonly<LevelInfo> | undefined {
    return this.getOrCreate(levelId);
  }

  /**
   * Records the height of a level. The first non-negative height wins.
   */
  register(levelId: ElementId, nextLevelId: ElementId, height: number): Readonly<LevelInfo> | undefined {
    const info = this.getOrCreate(levelId);
    if (!info) {
      log.warn('Cannot register height for unknown level', { operation: 'register', levelId });
      return undefined;
    }

    if (info.heightToNextLevel >= 0) {
      if (info.heightToNextLevel !== height) {
        log.debug('Keeping first registered height', { kept: info.heightToNextLevel, ignored: height }, { levelId });
      }
      return info;
    }

    if (height >= 0) {
      info.heightToNextLevel = height;
      info.nextLevelId = nextLevelId;
    }
    return info;
  }

  findHeight(levelId: ElementId): number {
    return this.infos.get(levelId)?.heightToNextLevel ?? UNKNOWN_HEIGHT;
  }

  findNextLevel(levelId: ElementId): ElementId {
    return this.infos.get(levelId)?.nextLevelId ?? INVALID_ELEMENT_ID;
  }

  /**
   * Supplies the height used when a level has no usable "up to level" attribute
   */
  setDefaultHeight(levelId: ElementId, height: number): void {
    if (!(height >= 0)) {
      throw new RangeError(`Default height of level ${levelId} must be non-negative, got ${height}`);
    }
    this.defaultHeights.set(levelId, height);
  }

  findDefaultHeight(levelId: ElementId): number | undefined {
    return this.defaultHeights.get(levelId);
  }

  /** Forget everything; call between export passes */
  clear(): void {
    this.infos.clear();
    this.defaultHeights.clear();
    this.stories = null;
  }

  private getOrCreate(levelId: ElementId): LevelInfo | undefined {
    const existing = this.infos.get(levelId);
    if (existing) return existing;

    const level = this.model.getLevel(levelId);
    if (!level) return undefined;

    const info: LevelInfo = {
      levelId,
      elevation: level.elevation,
      heightToNextLevel: UNKNOWN_HEIGHT,
      nextLevelId: INVALID_ELEMENT_ID,
    };
    this.infos.set(levelId, info);
    return info;
  }
}
