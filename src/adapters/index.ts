/**
 * Source registry: every board the pipeline knows, keyed by source id.
 */

import { UnknownSourceError } from '../utils/errors';
import { architectureAcademic } from './architecture';
import { automotiveEngineeringAcademic } from './automotive-engineering';
import { bukakPoliticalForum } from './bukak-forum';
import { chemistryAcademic } from './chemistry';
import { cmsBoards } from './cms-boards';
import type { NoticeSource } from './common/base';
import { universityContestEvent } from './contest-event';
import { globalHumanitiesRss } from './global-humanities';
import { designCeramicsAcademic, designMetalworkAcademic } from './kboard';
import { libraryGeneral } from './library';
import { lincAcademic } from './linc';
import { artsAcademic, universityAcademic, universityScholarship, universitySpecialLecture } from './list-board';

export type { NoticeSource, CollectContext, CollectResult } from './common/base';

export class SourceRegistry {
  private readonly sources = new Map<string, NoticeSource>();

  constructor(sources: readonly NoticeSource[]) {
    for (const source of sources) {
      if (this.sources.has(source.definition.id)) {
        throw new Error(`Duplicate source id: ${source.definition.id}`);
      }
      this.sources.set(source.definition.id, source);
    }
  }

  has(sourceId: string): boolean {
    return this.sources.has(sourceId);
  }

  /**
   * @throws UnknownSourceError
   */
  get(sourceId: string): NoticeSource {
    const source = this.sources.get(sourceId);
    if (!source) {
      throw new UnknownSourceError(sourceId);
    }
    return source;
  }

  ids(): string[] {
    return [...this.sources.keys()];
  }

  all(): NoticeSource[] {
    return [...this.sources.values()];
  }

  /** Registered sources minus the disabled ids */
  active(disabled: readonly string[] = []): NoticeSource[] {
    const skip = new Set(disabled);
    return this.all().filter(source => !skip.has(source.definition.id));
  }
}

export const ALL_SOURCES: readonly NoticeSource[] = [
  universityAcademic,
  universityScholarship,
  universitySpecialLecture,
  universityContestEvent,
  bukakPoliticalForum,
  libraryGeneral,
  architectureAcademic,
  artsAcademic,
  automotiveEngineeringAcademic,
  designCeramicsAcademic,
  designMetalworkAcademic,
  globalHumanitiesRss,
  lincAcademic,
  chemistryAcademic,
  ...cmsBoards,
];

export const sourceRegistry = new SourceRegistry(ALL_SOURCES);
