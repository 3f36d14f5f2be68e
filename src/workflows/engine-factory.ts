/**
 * Engine wiring
 * Maps the environment to the engine's typed configuration and assembles the
 * stage services around the configured providers and stores.
 */

import type {
  IDriftEvaluationService,
  IImageGenerationService,
  ImageGenerationOptions,
  ITextGenerationService,
} from '@/ai/interfaces.js';
import { getAIGateway } from '@/ai/gateway-singleton.js';
import { getEnvironment, type Environment } from '@/config/environment.js';
import { PageArtDirector } from '@/services/art-director.js';
import { BriefNormalizer } from '@/services/brief-normalizer.js';
import { ConsistencyQALoop } from '@/services/consistency-qa.js';
import { PdfDocumentRenderer, type IDocumentRenderer } from '@/services/document-renderer.js';
import { ExportAssembler } from '@/services/export-assembler.js';
import { RenderCoordinator } from '@/services/render-coordinator.js';
import { RunsService } from '@/services/runs.js';
import { MemorySnapshotStore, type ISnapshotStore } from '@/services/snapshot-store.js';
import { getArtifactStore } from '@/services/storage-singleton.js';
import type { IArtifactStore } from '@/services/storage.js';
import { StoryPlanner } from '@/services/story-planner.js';
import { StyleLockManager } from '@/services/style-lock.js';
import { getRenderGate, type ConcurrencyGate } from '@/shared/concurrency.js';
import type { PdfOrientation } from '@/shared/types.js';
import { StoryWorkflowEngine } from './engine.js';

export const MAX_CHARACTERS_PER_PAGE = 8;
export const MAX_PROMPT_LENGTH = 5000;

export interface EngineConfig {
  minPageCount: number;
  maxPageCount: number;
  defaultPageCount: number;
  defaultStyle: string;
  defaultContinuity: boolean;
  maxWordsPerPage: number;
  characterLockRetries: number;
  pageAttemptBudget: number;
  qaConcurrency: number;
  maxReferenceImages: number;
  aspectRatio: NonNullable<ImageGenerationOptions['aspectRatio']>;
  retryDelayMs: number;
  runTimeoutMs: number;
  pdfOrientation: PdfOrientation;
}

export function getEngineConfig(env: Environment = getEnvironment()): EngineConfig {
  return {
    minPageCount: env.MIN_PAGE_COUNT,
    maxPageCount: env.MAX_PAGE_COUNT,
    defaultPageCount: env.DEFAULT_PAGE_COUNT,
    defaultStyle: env.DEFAULT_ART_STYLE,
    defaultContinuity: env.PAGE_CONTINUITY,
    maxWordsPerPage: env.MAX_WORDS_PER_PAGE,
    characterLockRetries: env.CHARACTER_LOCK_RETRIES,
    pageAttemptBudget: env.PAGE_ATTEMPT_BUDGET,
    qaConcurrency: env.QA_CONCURRENCY,
    maxReferenceImages: env.MAX_REFERENCE_IMAGES,
    aspectRatio: env.IMAGE_ASPECT_RATIO,
    retryDelayMs: env.IMAGE_RETRY_DELAY_MS,
    runTimeoutMs: env.RUN_TIMEOUT_MINUTES * 60 * 1000,
    pdfOrientation: env.PDF_ORIENTATION,
  };
}

export interface EngineCollaborators {
  textService: ITextGenerationService;
  imageService: IImageGenerationService;
  driftEvaluator: IDriftEvaluationService;
  store: IArtifactStore;
  snapshots: ISnapshotStore;
  gate: ConcurrencyGate;
  documentRenderer?: IDocumentRenderer;
  now?: () => Date;
}

export function createEngine(config: EngineConfig, collaborators: EngineCollaborators): StoryWorkflowEngine {
  const { store, gate } = collaborators;
  const director = new PageArtDirector({
    maxWordsPerPage: config.maxWordsPerPage,
    maxPromptLength: MAX_PROMPT_LENGTH,
  });
  const coordinator = new RenderCoordinator(collaborators.imageService, store, gate, {
    maxReferenceImages: config.maxReferenceImages,
    aspectRatio: config.aspectRatio,
  });

  return new StoryWorkflowEngine(
    {
      normalizer: new BriefNormalizer({
        minPageCount: config.minPageCount,
        maxPageCount: config.maxPageCount,
        defaultPageCount: config.defaultPageCount,
        defaultStyle: config.defaultStyle,
        defaultContinuity: config.defaultContinuity,
      }),
      planner: new StoryPlanner(collaborators.textService, {
        maxWordsPerPage: config.maxWordsPerPage,
        maxCharactersPerPage: MAX_CHARACTERS_PER_PAGE,
      }),
      styleLock: new StyleLockManager(collaborators.imageService, store, gate, {
        characterLockRetries: config.characterLockRetries,
        retryDelayMs: config.retryDelayMs,
      }),
      director,
      coordinator,
      qa: new ConsistencyQALoop(collaborators.driftEvaluator, coordinator, director, {
        pageAttemptBudget: config.pageAttemptBudget,
        qaConcurrency: config.qaConcurrency,
      }),
      exporter: new ExportAssembler(
        store,
        collaborators.documentRenderer ?? new PdfDocumentRenderer(store, { orientation: config.pdfOrientation }),
      ),
      snapshots: collaborators.snapshots,
      ...(collaborators.now && { now: collaborators.now }),
    },
    { runTimeoutMs: config.runTimeoutMs },
  );
}

let _snapshotStoreSingleton: ISnapshotStore | null = null;

export function getSnapshotStore(): ISnapshotStore {
  if (!_snapshotStoreSingleton) {
    _snapshotStoreSingleton =
      getEnvironment().SNAPSHOT_STORE === 'postgres' ? new RunsService() : new MemorySnapshotStore();
  }
  return _snapshotStoreSingleton;
}

/**
 * Engine over the configured providers, stores and the process-wide render gate
 */
export function createEngineFromEnvironment(overrides: Partial<EngineConfig> = {}): StoryWorkflowEngine {
  const config = { ...getEngineConfig(), ...overrides };
  const gateway = getAIGateway();
  const store = getArtifactStore();
  return createEngine(config, {
    textService: gateway.getTextService(),
    imageService: gateway.getImageService(),
    driftEvaluator: gateway.createDriftEvaluator(store, config.retryDelayMs),
    store,
    snapshots: getSnapshotStore(),
    gate: getRenderGate(),
  });
}
