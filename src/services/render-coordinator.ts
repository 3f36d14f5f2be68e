/**
 * Render Coordinator
 * Assembles each page's reference set and issues the multi-reference image
 * request through the shared concurrency gate.
 *
 * Reference order for page i: style reference, then the reference of every
 * character on page i in page order, then page i-1's image when the project
 * renders with continuity.
 */

import { ImageGenerationBlockedError } from '@/ai/errors.js';
import type { IImageGenerationService, ImageGenerationOptions, ReferenceImage } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import type { ConcurrencyGate } from '@/shared/concurrency.js';
import { isSafetyBlockError } from '@/shared/retry-utils.js';
import type { ArtSpec, ImageArtifact, Project, RenderResult } from '@/shared/types.js';
import { extensionForMimeType } from '@/shared/utils.js';
import { RenderServiceError } from '@/workflows/errors.js';
import { artifactKeys, projectNamespace, type IArtifactStore } from './storage.js';

export interface RenderCoordinatorConfig {
  maxReferenceImages: number;
  aspectRatio: NonNullable<ImageGenerationOptions['aspectRatio']>;
}

export interface RenderPageOptions {
  /** Attempts already spent on this page; 0 for the first render */
  retryCount: number;
  /** Exact reference ids to reuse (corrective regenerations keep the original set) */
  references?: string[] | undefined;
  /** Page i-1's current render, used when the project renders with continuity */
  previous?: RenderResult | undefined;
  signal?: AbortSignal | undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RenderCoordinator {
  constructor(
    private readonly imageService: IImageGenerationService,
    private readonly store: IArtifactStore,
    private readonly gate: ConcurrencyGate,
    private readonly config: RenderCoordinatorConfig,
  ) {}

  /**
   * Ordered reference artifacts for a page. Throws when a lock the page needs
   * is missing, or when continuity is on and the previous page has no image.
   */
  referenceSet(project: Project, pageIndex: number, previous?: RenderResult): ImageArtifact[] {
    if (!project.styleReference) {
      throw new RenderServiceError(pageIndex, 'style reference is not locked');
    }
    const outline = project.pages.find((p) => p.index === pageIndex);
    if (!outline) {
      throw new RenderServiceError(pageIndex, 'page has no outline');
    }

    const references: ImageArtifact[] = [project.styleReference.image];
    for (const name of outline.characters) {
      const character = project.characters.find((c) => c.name.toLowerCase() === name.toLowerCase());
      if (!character?.referenceImage) {
        throw new RenderServiceError(pageIndex, `character "${name}" has no locked reference`);
      }
      references.push(character.referenceImage);
    }

    if (project.continuity && pageIndex > 1) {
      if (!previous?.image) {
        throw new RenderServiceError(pageIndex, `continuity reference unavailable: page ${pageIndex - 1} has no image`);
      }
      references.push(previous.image);
    }

    if (references.length > this.config.maxReferenceImages) {
      logger.warn('Reference set exceeds the provider limit, truncating', {
        projectId: project.id,
        pageIndex,
        count: references.length,
        limit: this.config.maxReferenceImages,
      });
      return references.slice(0, this.config.maxReferenceImages);
    }
    return references;
  }

  /**
   * Fail fast when any page would render without its locks in place.
   */
  assertReferencesLocked(project: Project): void {
    for (const page of project.pages) {
      // Continuity references are checked per page at render time
      this.referenceSet({ ...project, continuity: false }, page.index);
    }
  }

  /**
   * Render one page. Provider failures come back as a result without an image
   * and with `lastError` set (and `blocked` for a policy refusal); only an
   * abort rejects. A result with no `references` never reached the provider.
   */
  async renderPage(project: Project, spec: ArtSpec, options: RenderPageOptions): Promise<RenderResult> {
    const { pageIndex } = spec;
    const signal = options.signal;
    let referenceIds: string[] = options.references ?? [];

    try {
      if (!referenceIds.length) {
        referenceIds = this.referenceSet(project, pageIndex, options.previous).map((r) => r.id);
      }
      const referenceImages = await Promise.all(referenceIds.map((id) => this.loadReference(project, id)));

      logger.info('Rendering page', {
        projectId: project.id,
        pageIndex,
        revision: spec.revision,
        retryCount: options.retryCount,
        references: referenceIds,
      });

      const image = await this.gate.run(
        () =>
          this.imageService.generate(spec.prompt, {
            imageType: 'page',
            pageIndex,
            aspectRatio: this.config.aspectRatio,
            referenceImages,
            ...(signal && { signal }),
          }),
        signal,
      );

      const artifact = await this.store.put(
        projectNamespace(project),
        artifactKeys.page(pageIndex, options.retryCount, extensionForMimeType(image.mimeType)),
        image.buffer,
        image.mimeType,
      );

      return {
        pageIndex,
        image: artifact,
        references: referenceIds,
        verdict: 'pending',
        retryCount: options.retryCount,
        driftIssues: [],
      };
    } catch (error) {
      if (signal?.aborted) throw error;

      const failure =
        error instanceof RenderServiceError
          ? error
          : new RenderServiceError(pageIndex, describeError(error), {
              blocked: error instanceof ImageGenerationBlockedError || isSafetyBlockError(error),
              retriesConsumed: options.retryCount,
              cause: error,
            });
      logger.error('Page render failed', {
        projectId: project.id,
        pageIndex,
        retryCount: options.retryCount,
        blocked: failure.blocked,
        ...(error instanceof ImageGenerationBlockedError && { finishReasons: error.providerFinishReasons }),
        error: failure.message,
      });

      return {
        pageIndex,
        references: referenceIds,
        verdict: 'pending',
        retryCount: options.retryCount,
        driftIssues: [],
        lastError: failure.message,
        ...(failure.blocked && { blocked: true }),
      };
    }
  }

  /**
   * Initial render of every page. Pages run concurrently within the gate; with
   * continuity each page waits for its predecessor. `onResult` sees each result
   * as soon as it lands, so finished pages survive a later abort.
   */
  async renderAll(
    project: Project,
    onResult: (result: RenderResult) => void,
    signal?: AbortSignal,
  ): Promise<RenderResult[]> {
    this.assertReferencesLocked(project);

    const ordered = [...project.artSpecs].sort((a, b) => a.pageIndex - b.pageIndex);
    const renders: Array<Promise<RenderResult>> = [];
    let predecessor: Promise<RenderResult> | undefined;

    for (const spec of ordered) {
      const waitFor = project.continuity ? predecessor : undefined;
      const rendering = (async () => {
        const previous = waitFor ? await waitFor : undefined;
        const result = await this.renderPage(project, spec, { retryCount: 0, previous, signal });
        onResult(result);
        return result;
      })();
      renders.push(rendering);
      predecessor = rendering;
    }

    return Promise.all(renders);
  }

  private async loadReference(project: Project, artifactId: string): Promise<ReferenceImage> {
    const artifact = this.findArtifact(project, artifactId);
    return {
      buffer: await this.store.get(artifactId),
      mimeType: artifact?.mimeType ?? 'image/png',
      source: artifactId,
    };
  }

  private findArtifact(project: Project, artifactId: string): ImageArtifact | undefined {
    if (project.styleReference?.image.id === artifactId) return project.styleReference.image;
    for (const character of project.characters) {
      if (character.referenceImage?.id === artifactId) return character.referenceImage;
    }
    return project.renders.find((r) => r.image?.id === artifactId)?.image;
  }
}
