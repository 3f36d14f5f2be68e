/**
 * Story Workflow Engine
 * Drives one project through
 *
 *   planning -> styling -> drafting_art -> rendering -> qa -> exported | failed
 *
 * A snapshot is saved after every transition. Stage-fatal errors end the
 * project in `failed` with a FailureReport; page-level failures stay on their
 * RenderResult until export refuses the story. Cancellation and the run
 * timeout abort only this project's outstanding calls.
 */

import { logger } from '@/config/logger.js';
import type { BriefInput, BriefNormalizer } from '@/services/brief-normalizer.js';
import type { PageArtDirector } from '@/services/art-director.js';
import type { ConsistencyQALoop } from '@/services/consistency-qa.js';
import type { ExportAssembler } from '@/services/export-assembler.js';
import type { RenderCoordinator } from '@/services/render-coordinator.js';
import { createSnapshot, type ISnapshotStore } from '@/services/snapshot-store.js';
import type { StoryPlanner } from '@/services/story-planner.js';
import type { StyleLockManager } from '@/services/style-lock.js';
import { workflowErrorHandler } from '@/shared/workflow-error-handler.js';
import type { ArtSpec, Project, ProjectSnapshot, ProjectState, RenderResult } from '@/shared/types.js';
import type { WorkflowStage } from './errors.js';

export interface StoryWorkflowDependencies {
  normalizer: BriefNormalizer;
  planner: StoryPlanner;
  styleLock: StyleLockManager;
  director: PageArtDirector;
  coordinator: RenderCoordinator;
  qa: ConsistencyQALoop;
  exporter: ExportAssembler;
  snapshots: ISnapshotStore;
  now?: () => Date;
}

export interface StoryWorkflowConfig {
  /** Abort the run after this many milliseconds; 0 disables the timeout */
  runTimeoutMs: number;
}

export interface RunOptions {
  signal?: AbortSignal | undefined;
  onTransition?: ((snapshot: ProjectSnapshot) => void) | undefined;
}

const TERMINAL_STATES: ReadonlySet<ProjectState> = new Set(['exported', 'failed']);

export function isTerminalState(state: ProjectState): boolean {
  return TERMINAL_STATES.has(state);
}

function upsertByPage<T extends { pageIndex: number }>(items: T[], item: T): T[] {
  return [...items.filter((existing) => existing.pageIndex !== item.pageIndex), item].sort(
    (a, b) => a.pageIndex - b.pageIndex,
  );
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class StoryWorkflowEngine {
  private readonly now: () => Date;

  constructor(
    private readonly deps: StoryWorkflowDependencies,
    private readonly config: StoryWorkflowConfig,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Normalize the brief into a project in `planning` and save its first
   * snapshot. Throws InvalidBriefError; nothing is saved for a bad brief.
   */
  async createProject(input: BriefInput, options: { id?: string } = {}): Promise<Project> {
    const project = this.deps.normalizer.normalize(input, { ...options, now: this.now() });
    logger.info('Project created', {
      projectId: project.id,
      slug: project.slug,
      pageCount: project.targetPageCount,
      style: project.styleDescriptor,
      audience: project.audience,
      continuity: project.continuity,
    });
    await this.saveSnapshot(project, 'intake->planning');
    return project;
  }

  /**
   * Run every stage of a project created by createProject. Resolves with the
   * project in `exported` (frozen) or `failed`; stage failures never reject.
   */
  async run(project: Project, options: RunOptions = {}): Promise<Project> {
    const controller = new AbortController();
    const abortFromCaller = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      abortFromCaller();
    } else {
      options.signal?.addEventListener('abort', abortFromCaller, { once: true });
    }
    const timer =
      this.config.runTimeoutMs > 0
        ? setTimeout(() => controller.abort(new Error(`run timed out after ${this.config.runTimeoutMs}ms`)), this.config.runTimeoutMs)
        : undefined;
    timer?.unref();

    const signal = controller.signal;
    let stage: WorkflowStage = 'planning';
    const startedAt = Date.now();

    try {
      signal.throwIfAborted();
      const outline = await this.stage(project, stage, () => this.deps.planner.plan(project, signal));
      project.characters = outline.characters;
      project.pages = outline.pages;
      await this.transition(project, 'styling', options);

      stage = 'styling';
      signal.throwIfAborted();
      const locks = await this.stage(project, stage, () =>
        this.deps.styleLock.lock(project, project.characters, signal),
      );
      project.styleReference = locks.styleReference;
      project.characters = locks.characters;
      await this.transition(project, 'drafting_art', options);

      stage = 'drafting_art';
      signal.throwIfAborted();
      const directed = this.deps.director.directAll(project, project.pages);
      project.pages = directed.pages;
      project.artSpecs = directed.artSpecs;
      project.warnings.push(...directed.warnings);
      await this.transition(project, 'rendering', options);

      stage = 'rendering';
      signal.throwIfAborted();
      const keepRender = (result: RenderResult) => {
        project.renders = upsertByPage(project.renders, result);
      };
      const keepArtSpec = (spec: ArtSpec) => {
        project.artSpecs = upsertByPage(project.artSpecs, spec);
      };
      await this.stage(project, stage, () => this.deps.coordinator.renderAll(project, keepRender, signal));
      await this.transition(project, 'qa', options);

      stage = 'qa';
      signal.throwIfAborted();
      await this.stage(project, stage, () =>
        this.deps.qa.run(project, { onResult: keepRender, onArtSpec: keepArtSpec }, signal),
      );

      stage = 'export';
      signal.throwIfAborted();
      const exported = await this.stage(project, stage, () => this.deps.exporter.export(project, this.now()));
      project.document = exported.document;
      await this.transition(project, 'exported', options);
      deepFreeze(project);

      logger.info('Project exported', {
        projectId: project.id,
        document: exported.document.uri,
        pages: exported.record.pages.length,
        durationMs: Date.now() - startedAt,
      });
    } catch (error) {
      const from = project.state;
      project.failure = workflowErrorHandler.handle(project.id, error, stage, signal);
      await this.transition(project, 'failed', options, from);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', abortFromCaller);
    }

    return project;
  }

  private async stage<T>(project: Project, stage: WorkflowStage, task: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    logger.info('Stage started', { projectId: project.id, stage });
    const result = await task();
    logger.info('Stage completed', { projectId: project.id, stage, durationMs: Date.now() - startedAt });
    return result;
  }

  private async transition(
    project: Project,
    next: ProjectState,
    options: RunOptions,
    from: ProjectState = project.state,
  ): Promise<void> {
    project.state = next;
    project.updatedAt = this.now().toISOString();
    const snapshot = await this.saveSnapshot(project, `${from}->${next}`);
    options.onTransition?.(snapshot);
  }

  /**
   * Persist a snapshot. A store outage is logged and does not fail the project.
   */
  private async saveSnapshot(project: Project, transition: string): Promise<ProjectSnapshot> {
    const snapshot = createSnapshot(project, transition, this.now());
    try {
      await this.deps.snapshots.save(snapshot);
    } catch (error) {
      logger.error('Snapshot could not be saved', {
        projectId: project.id,
        transition,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return snapshot;
  }
}
