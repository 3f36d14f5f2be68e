import { describe, it, expect, beforeEach, jest } from '@jest/globals';

jest.mock('@/config/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('@/db/workflows-db', () => ({
  getWorkflowsDatabase: jest.fn(),
  projectRuns: { projectId: 'project_runs.project_id' },
  projectRunTransitions: { transition: 'project_run_transitions.transition' },
}));

jest.mock('drizzle-orm', () => ({
  eq: jest.fn((column: unknown, value: unknown) => ({ column, value })),
}));

import { RunsService } from '../services/runs';
import { createSnapshot } from '../services/snapshot-store';
import { getWorkflowsDatabase, projectRuns, projectRunTransitions } from '@/db/workflows-db';
import { logger } from '@/config/logger';
import { FIXED_NOW, PROJECT_ID, plannedFoxAndOwlProject } from './helpers/fixtures';

describe('RunsService', () => {
  const runValues = jest.fn();
  const onConflictDoUpdate = jest.fn();
  const transitionValues = jest.fn();
  const where = jest.fn();
  const mockDb = {
    transaction: jest.fn(),
    insert: jest.fn(),
    select: jest.fn(),
  };
  let service: RunsService;

  beforeEach(() => {
    jest.clearAllMocks();
    (getWorkflowsDatabase as jest.Mock).mockReturnValue(mockDb);

    onConflictDoUpdate.mockImplementation(async () => undefined);
    runValues.mockImplementation(() => ({ onConflictDoUpdate }));
    transitionValues.mockImplementation(async () => undefined);
    mockDb.insert.mockImplementation((table: unknown) =>
      table === projectRuns ? { values: runValues } : { values: transitionValues },
    );
    mockDb.transaction.mockImplementation(async (work: unknown) => {
      if (typeof work !== 'function') throw new Error('transaction needs a callback');
      return work(mockDb);
    });
    mockDb.select.mockImplementation(() => ({ from: () => ({ where }) }));

    service = new RunsService();
  });

  it('upserts the latest snapshot and records the transition in one transaction', async () => {
    const project = { ...plannedFoxAndOwlProject(), state: 'styling' as const };
    const snapshot = createSnapshot(project, 'planning->styling', FIXED_NOW);

    await service.save(snapshot);

    expect(mockDb.transaction).toHaveBeenCalledTimes(1);
    expect(runValues).toHaveBeenCalledWith(
      expect.objectContaining({
        projectId: PROJECT_ID,
        slug: 'fox-and-owl-solve-mysteries',
        state: 'styling',
        lastTransition: 'planning->styling',
        failure: null,
        capturedAt: '2026-01-15T10:00:00.000Z',
      }),
    );
    expect(onConflictDoUpdate).toHaveBeenCalledWith(
      expect.objectContaining({ target: 'project_runs.project_id' }),
    );
    expect(mockDb.insert).toHaveBeenCalledWith(projectRunTransitions);
    expect(transitionValues).toHaveBeenCalledWith({
      projectId: PROJECT_ID,
      transition: 'planning->styling',
      state: 'styling',
      capturedAt: '2026-01-15T10:00:00.000Z',
    });
  });

  it('logs and rethrows when the snapshot cannot be written', async () => {
    mockDb.transaction.mockImplementation(async () => {
      throw new Error('connection refused');
    });
    const snapshot = createSnapshot(plannedFoxAndOwlProject(), 'intake->planning', FIXED_NOW);

    await expect(service.save(snapshot)).rejects.toThrow('connection refused');
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to save project snapshot',
      expect.objectContaining({ projectId: PROJECT_ID, transition: 'intake->planning' }),
    );
  });

  it('maps the stored row back to a snapshot', async () => {
    const project = { ...plannedFoxAndOwlProject(), state: 'qa' as const };
    where.mockImplementation(async () => [
      {
        projectId: PROJECT_ID,
        slug: project.slug,
        state: 'qa',
        lastTransition: 'rendering->qa',
        snapshot: project,
        failure: null,
        capturedAt: '2026-01-15T10:00:00.000Z',
        createdAt: '2026-01-15T10:00:00.000Z',
        updatedAt: '2026-01-15T10:00:00.000Z',
      },
    ]);

    const snapshot = await service.get(PROJECT_ID);

    expect(snapshot).toEqual({
      projectId: PROJECT_ID,
      state: 'qa',
      transition: 'rendering->qa',
      capturedAt: '2026-01-15T10:00:00.000Z',
      project,
    });
  });

  it('returns null for an unknown project', async () => {
    where.mockImplementation(async () => []);

    await expect(service.get(PROJECT_ID)).resolves.toBeNull();
  });

  it('returns null without querying for an id that is not a uuid', async () => {
    await expect(service.get('not-a-project')).resolves.toBeNull();
    expect(mockDb.select).not.toHaveBeenCalled();
  });
});
