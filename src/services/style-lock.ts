/**
 * Style Lock Manager
 * Generates the project's style reference, then one reference per character
 * conditioned on it. Each lock is produced once; an existing lock is reused.
 */

import type { IImageGenerationService, ReferenceImage } from '@/ai/interfaces.js';
import { logger } from '@/config/logger.js';
import type { ConcurrencyGate } from '@/shared/concurrency.js';
import { sleep } from '@/shared/retry-utils.js';
import type { Character, Project, StyleReference } from '@/shared/types.js';
import { extensionForMimeType } from '@/shared/utils.js';
import { CharacterLockFailure, StyleLockFailure } from '@/workflows/errors.js';
import { PromptService } from './prompt.js';
import { artifactKeys, projectNamespace, type IArtifactStore } from './storage.js';

export interface StyleLockConfig {
  /** Additional attempts after a failed character generation */
  characterLockRetries: number;
  retryDelayMs: number;
}

export interface StyleLockResult {
  styleReference: StyleReference;
  characters: Character[];
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class StyleLockManager {
  constructor(
    private readonly imageService: IImageGenerationService,
    private readonly store: IArtifactStore,
    private readonly gate: ConcurrencyGate,
    private readonly config: StyleLockConfig,
  ) {}

  async lock(project: Project, characters: Character[], signal?: AbortSignal): Promise<StyleLockResult> {
    const { styleReference, styleBytes } = await this.lockStyle(project, signal);
    const styleImage: ReferenceImage = {
      buffer: styleBytes,
      mimeType: styleReference.image.mimeType,
      source: styleReference.image.id,
    };

    // Characters only start once the style plate exists; they run side by side
    const settled = await Promise.allSettled(
      characters.map((character, i) => this.lockCharacter(project, character, i + 1, styleImage, signal)),
    );

    signal?.throwIfAborted();
    const locked: Character[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      locked.push(outcome.value);
    }

    logger.info('Style lock complete', {
      projectId: project.id,
      styleReference: styleReference.image.id,
      characters: locked.map((c) => ({ name: c.name, reference: c.referenceImage?.id })),
    });

    return { styleReference, characters: locked };
  }

  private async lockStyle(
    project: Project,
    signal?: AbortSignal,
  ): Promise<{ styleReference: StyleReference; styleBytes: Buffer }> {
    if (project.styleReference) {
      logger.debug('Style reference already locked, reusing', {
        projectId: project.id,
        styleReference: project.styleReference.image.id,
      });
      return { styleReference: project.styleReference, styleBytes: await this.store.get(project.styleReference.image.id) };
    }

    const template = await PromptService.loadPrompt('style-reference');
    const { systemPrompt, userPrompt } = PromptService.buildPrompt(template, {
      title: project.title,
      topic: project.topic,
      styleDescriptor: project.styleDescriptor,
    });

    logger.info('Generating style reference', { projectId: project.id, styleDescriptor: project.styleDescriptor });

    try {
      const image = await this.gate.run(
        () =>
          this.imageService.generate(userPrompt, {
            imageType: 'style_reference',
            aspectRatio: '1:1',
            ...(systemPrompt && { systemPrompt }),
            ...(signal && { signal }),
          }),
        signal,
      );
      const artifact = await this.store.put(
        projectNamespace(project),
        artifactKeys.styleReference(extensionForMimeType(image.mimeType)),
        image.buffer,
        image.mimeType,
      );
      return {
        styleReference: { image: artifact, descriptor: project.styleDescriptor },
        styleBytes: image.buffer,
      };
    } catch (error) {
      if (signal?.aborted) throw error;
      logger.error('Style reference generation failed', { projectId: project.id, error: describeError(error) });
      throw new StyleLockFailure(describeError(error), error);
    }
  }

  private async lockCharacter(
    project: Project,
    character: Character,
    ordinal: number,
    styleImage: ReferenceImage,
    signal?: AbortSignal,
  ): Promise<Character> {
    if (character.referenceImage) {
      return character;
    }

    const template = await PromptService.loadPrompt('character-reference');
    const { systemPrompt, userPrompt } = PromptService.buildPrompt(template, {
      name: character.name,
      visualTag: character.visualTag,
      styleDescriptor: project.styleDescriptor,
    });

    const maxAttempts = 1 + this.config.characterLockRetries;
    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const image = await this.gate.run(
          () =>
            this.imageService.generate(userPrompt, {
              imageType: 'character_reference',
              aspectRatio: '1:1',
              referenceImages: [styleImage],
              ...(systemPrompt && { systemPrompt }),
              ...(signal && { signal }),
            }),
          signal,
        );
        const artifact = await this.store.put(
          projectNamespace(project),
          artifactKeys.character(ordinal, character.name, extensionForMimeType(image.mimeType)),
          image.buffer,
          image.mimeType,
        );
        logger.info('Character reference locked', {
          projectId: project.id,
          character: character.name,
          attempt,
          reference: artifact.id,
        });
        return { ...character, referenceImage: artifact };
      } catch (error) {
        if (signal?.aborted) throw error;
        lastError = error;
        logger.warn('Character reference generation failed', {
          projectId: project.id,
          character: character.name,
          attempt,
          maxAttempts,
          error: describeError(error),
        });
        if (attempt < maxAttempts) {
          await sleep(this.config.retryDelayMs * attempt, signal);
        }
      }
    }

    throw new CharacterLockFailure(character.name, this.config.characterLockRetries, describeError(lastError), lastError);
  }
}
