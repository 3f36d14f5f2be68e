/**
 * Project Registry
 * In-flight projects of this process, each with its own abort controller.
 */

import { logger } from '@/config/logger.js';
import type { BriefInput } from '@/services/brief-normalizer.js';
import type { Project, ProjectSnapshot } from '@/shared/types.js';
import type { StoryWorkflowEngine } from './engine.js';

interface ActiveProject {
  controller: AbortController;
  completion: Promise<Project>;
}

export type CancelOutcome = 'cancelled' | 'not_running';

export class ProjectRegistry {
  private readonly active = new Map<string, ActiveProject>();

  constructor(private readonly engine: StoryWorkflowEngine) {}

  /**
   * Create the project and start its run in the background. Resolves once the
   * project exists; rejects with InvalidBriefError for a bad brief.
   */
  async submit(
    input: BriefInput,
    options: { onTransition?: (snapshot: ProjectSnapshot) => void } = {},
  ): Promise<Project> {
    const project = await this.engine.createProject(input);
    const initial = structuredClone(project);
    const controller = new AbortController();

    const completion = this.engine
      .run(project, { signal: controller.signal, onTransition: options.onTransition })
      .catch((error: unknown) => {
        logger.error('Project run rejected unexpectedly', {
          projectId: project.id,
          error: error instanceof Error ? error.message : String(error),
        });
        return project;
      })
      .finally(() => {
        this.active.delete(project.id);
      });

    this.active.set(project.id, { controller, completion });
    return initial;
  }

  cancel(projectId: string, reason = 'cancelled by request'): CancelOutcome {
    const entry = this.active.get(projectId);
    if (!entry) {
      return 'not_running';
    }
    logger.info('Cancelling project', { projectId, reason });
    entry.controller.abort(reason);
    return 'cancelled';
  }

  isRunning(projectId: string): boolean {
    return this.active.has(projectId);
  }

  /** Settles with the finished project, or undefined when it is not running */
  wait(projectId: string): Promise<Project> | undefined {
    return this.active.get(projectId)?.completion;
  }

  get size(): number {
    return this.active.size;
  }

  /**
   * Cancel every running project and wait for each to settle
   */
  async shutdown(reason = 'service shutting down'): Promise<void> {
    const entries = [...this.active.values()];
    for (const entry of entries) {
      entry.controller.abort(reason);
    }
    await Promise.all(entries.map((entry) => entry.completion));
  }
}
