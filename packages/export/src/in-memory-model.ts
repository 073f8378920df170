/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { readFile } from 'node:fs/promises';
import type { ElementId, HostModel, LengthUnit, Level, ModelElement, PlanView } from '@storey-split/data';
import { parseModelDocumentText } from './model-document.js';
import type { ModelDocument } from './model-document.js';

/**
 * Host model backed by a model document held in memory
 */
export class InMemoryModel implements HostModel {
  private levelsById: Map<ElementId, Level>;
  private elementsById: Map<ElementId, ModelElement>;

  constructor(private readonly document: ModelDocument) {
    this.levelsById = new Map(document.levels.map((level) => [level.id, level]));
    this.elementsById = new Map(document.elements.map((element) => [element.id, element]));
  }

  static fromJSON(text: string): InMemoryModel {
    return new InMemoryModel(parseModelDocumentText(text));
  }

  static async fromFile(path: string): Promise<InMemoryModel> {
    const text = await readFile(path, 'utf-8');
    return InMemoryModel.fromJSON(text);
  }

  /** Length unit declared by the document, if any */
  get unit(): LengthUnit | undefined {
    return this.document.unit;
  }

  getLevels(): readonly Level[] {
    return this.document.levels;
  }

  getLevel(id: ElementId): Level | undefined {
    return this.levelsById.get(id);
  }

  getElement(id: ElementId): ModelElement | undefined {
    return this.elementsById.get(id);
  }

  getElements(): readonly ModelElement[] {
    return this.document.elements;
  }

  getViews(): readonly PlanView[] {
    return this.document.views;
  }
}
