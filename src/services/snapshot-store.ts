/**
 * Snapshot persistence boundary. The engine saves a snapshot after every
 * stage transition; the HTTP surface reads the latest one back.
 */

import type { Project, ProjectSnapshot } from '@/shared/types.js';

export interface ISnapshotStore {
  save(snapshot: ProjectSnapshot): Promise<void>;
  get(projectId: string): Promise<ProjectSnapshot | null>;
}

/**
 * Deep copy of the project; later mutations of the live project never reach a saved snapshot.
 */
export function createSnapshot(project: Project, transition: string, now: Date = new Date()): ProjectSnapshot {
  return {
    projectId: project.id,
    state: project.state,
    transition,
    capturedAt: now.toISOString(),
    project: structuredClone(project),
  };
}

export class MemorySnapshotStore implements ISnapshotStore {
  private readonly latest = new Map<string, ProjectSnapshot>();
  private readonly history = new Map<string, string[]>();

  async save(snapshot: ProjectSnapshot): Promise<void> {
    this.latest.set(snapshot.projectId, structuredClone(snapshot));
    const transitions = this.history.get(snapshot.projectId) ?? [];
    transitions.push(snapshot.transition);
    this.history.set(snapshot.projectId, transitions);
  }

  async get(projectId: string): Promise<ProjectSnapshot | null> {
    const snapshot = this.latest.get(projectId);
    return snapshot ? structuredClone(snapshot) : null;
  }

  /** Transitions recorded for a project, oldest first */
  transitions(projectId: string): string[] {
    return [...(this.history.get(projectId) ?? [])];
  }
}
