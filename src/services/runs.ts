/**
 * Runs Service
 * Postgres snapshot store: one project_runs row per project holding the latest
 * snapshot, one project_run_transitions row per stage transition.
 */

import { eq } from 'drizzle-orm';
import { getWorkflowsDatabase, projectRuns, projectRunTransitions } from '@/db/workflows-db.js';
import type { SelectProjectRun, WorkflowsDatabase } from '@/db/workflows-db.js';
import { logger } from '@/config/logger.js';
import type { ProjectSnapshot } from '@/shared/types.js';
import type { ISnapshotStore } from './snapshot-store.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export class RunsService implements ISnapshotStore {
  private db: WorkflowsDatabase = getWorkflowsDatabase();

  /**
   * Upsert the latest snapshot and record the transition
   */
  async save(snapshot: ProjectSnapshot): Promise<void> {
    try {
      const row = {
        projectId: snapshot.projectId,
        slug: snapshot.project.slug,
        state: snapshot.state,
        lastTransition: snapshot.transition,
        snapshot: snapshot.project,
        failure: snapshot.project.failure ?? null,
        capturedAt: snapshot.capturedAt,
        updatedAt: new Date().toISOString(),
      };

      await this.db.transaction(async (tx) => {
        await tx
          .insert(projectRuns)
          .values(row)
          .onConflictDoUpdate({
            target: projectRuns.projectId,
            set: {
              state: row.state,
              lastTransition: row.lastTransition,
              snapshot: row.snapshot,
              failure: row.failure,
              capturedAt: row.capturedAt,
              updatedAt: row.updatedAt,
            },
          });
        await tx.insert(projectRunTransitions).values({
          projectId: snapshot.projectId,
          transition: snapshot.transition,
          state: snapshot.state,
          capturedAt: snapshot.capturedAt,
        });
      });

      logger.debug('Project snapshot saved', {
        projectId: snapshot.projectId,
        transition: snapshot.transition,
      });
    } catch (error) {
      logger.error('Failed to save project snapshot', {
        error: error instanceof Error ? error.message : String(error),
        projectId: snapshot.projectId,
        transition: snapshot.transition,
      });
      throw error;
    }
  }

  /**
   * Latest snapshot of a project, or null when the project is unknown
   */
  async get(projectId: string): Promise<ProjectSnapshot | null> {
    if (!UUID_PATTERN.test(projectId)) {
      return null;
    }

    try {
      const [run] = await this.db.select().from(projectRuns).where(eq(projectRuns.projectId, projectId));
      return run ? toSnapshot(run) : null;
    } catch (error) {
      logger.error('Failed to get project snapshot', {
        error: error instanceof Error ? error.message : String(error),
        projectId,
      });
      throw error;
    }
  }
}

function toSnapshot(run: SelectProjectRun): ProjectSnapshot {
  return {
    projectId: run.projectId,
    state: run.state,
    transition: run.lastTransition,
    capturedAt: run.capturedAt,
    project: run.snapshot,
  };
}
