/**
 * Export Assembler
 * Collects finalized pages into the StoryRecord, saves story_data.json and
 * hands the record to the document renderer. Export is refused unless every
 * page 1..N has passed QA.
 */

import { logger } from '@/config/logger.js';
import type { DocumentArtifact, Project, StoryPage, StoryRecord } from '@/shared/types.js';
import { DocumentRenderError, IncompleteStoryError } from '@/workflows/errors.js';
import type { IDocumentRenderer } from './document-renderer.js';
import { artifactKeys, projectNamespace, type IArtifactStore, type StoredArtifact } from './storage.js';

export const STORY_DATA_VERSION = '1.0';

export interface ExportResult {
  record: StoryRecord;
  storyData: StoredArtifact;
  document: DocumentArtifact;
}

export class ExportAssembler {
  constructor(
    private readonly store: IArtifactStore,
    private readonly renderer: IDocumentRenderer,
  ) {}

  /**
   * Build the StoryRecord, or throw IncompleteStoryError naming every page
   * that is missing or has not passed.
   */
  assemble(project: Project, now: Date = new Date()): StoryRecord {
    if (!project.styleReference) {
      throw new IncompleteStoryError([], 0, 'style reference is missing');
    }

    const offending: number[] = [];
    const reasons: string[] = [];
    let retriesConsumed = 0;
    const pages: StoryPage[] = [];

    for (let index = 1; index <= project.targetPageCount; index++) {
      const outline = project.pages.find((p) => p.index === index);
      const artSpec = project.artSpecs.find((s) => s.pageIndex === index);
      const render = project.renders.find((r) => r.pageIndex === index);

      if (!outline || !artSpec || !render) {
        offending.push(index);
        reasons.push(`page ${index} is missing`);
        continue;
      }
      if (render.verdict !== 'pass' || !render.image) {
        offending.push(index);
        retriesConsumed += render.retryCount;
        reasons.push(`page ${index} is ${render.verdict}${render.lastError ? `: ${render.lastError}` : ''}`);
        continue;
      }
      pages.push({ outline, artSpec, render });
    }

    const stray = project.pages.filter((p) => p.index < 1 || p.index > project.targetPageCount).map((p) => p.index);
    for (const index of stray) {
      offending.push(index);
      reasons.push(`page ${index} is outside 1..${project.targetPageCount}`);
    }

    if (offending.length) {
      throw new IncompleteStoryError(offending, retriesConsumed, reasons.join('; '));
    }

    return {
      projectId: project.id,
      slug: project.slug,
      title: project.title,
      audience: project.audience,
      styleDescriptor: project.styleDescriptor,
      styleReference: project.styleReference,
      characters: project.characters,
      pages,
      assembledAt: now.toISOString(),
    };
  }

  async export(project: Project, now: Date = new Date()): Promise<ExportResult> {
    const record = this.assemble(project, now);
    const namespace = projectNamespace(project);

    const payload = { ...record, savedAt: now.toISOString(), version: STORY_DATA_VERSION };
    const storyData = await this.store.put(
      namespace,
      artifactKeys.storyData(),
      Buffer.from(JSON.stringify(payload, null, 2), 'utf-8'),
      'application/json',
    );

    let document: DocumentArtifact;
    try {
      document = await this.renderer.render(record, namespace);
    } catch (error) {
      if (error instanceof DocumentRenderError) throw error;
      throw new DocumentRenderError(error instanceof Error ? error.message : String(error), error);
    }

    logger.info('Story exported', {
      projectId: project.id,
      pages: record.pages.length,
      storyData: storyData.id,
      document: document.id,
    });
    return { record, storyData, document };
  }
}
