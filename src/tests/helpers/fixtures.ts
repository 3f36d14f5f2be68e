import { PageArtDirector } from '@/services/art-director';
import { BriefNormalizer } from '@/services/brief-normalizer';
import type { IArtifactStore } from '@/services/storage';
import { StyleLockManager } from '@/services/style-lock';
import { ConcurrencyGate } from '@/shared/concurrency';
import type { Project } from '@/shared/types';
import type { EngineConfig } from '@/workflows/engine-factory';
import { FakeImageService } from './fakes';

export const PROJECT_ID = '0f0e0d0c-1111-4222-8333-444455556666';
export const FOX_AND_OWL_BRIEF = 'fox and owl solve mysteries, watercolor, 5 pages';
export const FOX_AND_OWL_NAMESPACE = 'fox-and-owl-solve-mysteries-0f0e0d0c';
export const FIXED_NOW = new Date('2026-01-15T10:00:00.000Z');

export const FOX = { name: 'Fox', visualTag: 'small red fox with a green scarf' };
export const OWL = { name: 'Owl', visualTag: 'round brown owl with spectacles' };

/** Cast per page for the five-page fox-and-owl outline */
export const FOX_AND_OWL_CAST: string[][] = [['Fox'], ['Fox', 'Owl'], ['Owl'], [], ['Fox', 'Owl']];

export const TEST_ENGINE_CONFIG: EngineConfig = {
  minPageCount: 1,
  maxPageCount: 50,
  defaultPageCount: 8,
  defaultStyle: 'watercolor',
  defaultContinuity: false,
  maxWordsPerPage: 120,
  characterLockRetries: 2,
  pageAttemptBudget: 3,
  qaConcurrency: 2,
  maxReferenceImages: 10,
  aspectRatio: '3:4',
  retryDelayMs: 0,
  runTimeoutMs: 0,
  pdfOrientation: 'portrait',
};

export function createNormalizer(): BriefNormalizer {
  return new BriefNormalizer({
    minPageCount: TEST_ENGINE_CONFIG.minPageCount,
    maxPageCount: TEST_ENGINE_CONFIG.maxPageCount,
    defaultPageCount: TEST_ENGINE_CONFIG.defaultPageCount,
    defaultStyle: TEST_ENGINE_CONFIG.defaultStyle,
    defaultContinuity: TEST_ENGINE_CONFIG.defaultContinuity,
  });
}

export function outlineJson(
  cast: string[][],
  characters: Array<{ name: string; visualTag: string }> = [FOX, OWL],
): string {
  return JSON.stringify({
    characters,
    pages: cast.map((names, i) => ({
      index: i + 1,
      text: `Page ${i + 1} of the mystery.`,
      sceneIntent: `Scene ${i + 1} in the forest`,
      characters: names,
    })),
  });
}

/**
 * The fox-and-owl project with its outline applied, as the planner would leave it
 */
export function plannedFoxAndOwlProject(overrides: Partial<Project> = {}): Project {
  const project = createNormalizer().normalize({ brief: FOX_AND_OWL_BRIEF }, { id: PROJECT_ID, now: FIXED_NOW });
  return {
    ...project,
    characters: [{ ...FOX }, { ...OWL }],
    pages: FOX_AND_OWL_CAST.map((names, i) => ({
      index: i + 1,
      text: `Page ${i + 1} of the mystery.`,
      sceneIntent: `Scene ${i + 1} in the forest`,
      characters: names,
    })),
    ...overrides,
  };
}

/**
 * The planned project after style lock and art direction, references written to `store`.
 * Lock renders go through their own fake so tests only see page requests.
 */
export async function directedFoxAndOwlProject(
  store: IArtifactStore,
  overrides: Partial<Project> = {},
): Promise<Project> {
  const project = plannedFoxAndOwlProject(overrides);
  const locks = new StyleLockManager(new FakeImageService(), store, new ConcurrencyGate(3), {
    characterLockRetries: TEST_ENGINE_CONFIG.characterLockRetries,
    retryDelayMs: 0,
  });
  const { styleReference, characters } = await locks.lock(project, project.characters);
  const director = new PageArtDirector({ maxWordsPerPage: TEST_ENGINE_CONFIG.maxWordsPerPage, maxPromptLength: 5000 });
  const locked = { ...project, styleReference, characters };
  const { pages, artSpecs } = director.directAll(locked, locked.pages);
  return { ...locked, pages, artSpecs };
}
