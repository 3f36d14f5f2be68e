/**
 * Project API Routes
 * Start a project from a brief, read its latest snapshot, cancel it
 */

import { Router, type Response } from 'express';
import { z } from 'zod';
import { logger } from '@/config/logger.js';
import type { ISnapshotStore } from '@/services/snapshot-store.js';
import { AUDIENCE_BANDS } from '@/shared/types.js';
import { InvalidBriefError } from '@/workflows/errors.js';
import type { ProjectRegistry } from '@/workflows/project-registry.js';

const CreateProjectSchema = z.object({
  brief: z.string().min(1),
  title: z.string().min(1).max(200).optional(),
  audience: z.enum(AUDIENCE_BANDS).optional(),
  pageCount: z.number().int().optional(),
  style: z.string().min(1).max(100).optional(),
  characters: z.array(z.string().min(1).max(60)).max(20).optional(),
  continuity: z.boolean().optional(),
});

function sendErrorResponse(res: Response, statusCode: number, message: string, details?: Record<string, unknown>) {
  if (statusCode >= 500) {
    logger.error(`Project API error: ${message}`, details);
  } else {
    logger.warn(`Project API rejected request: ${message}`, details);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(details && { details }),
  });
}

export function createProjectsRouter(deps: { registry: ProjectRegistry; snapshots: ISnapshotStore }): Router {
  const { registry, snapshots } = deps;
  const router = Router();

  /**
   * POST /projects
   * Normalize the brief and start the workflow in the background
   */
  router.post('/', async (req, res) => {
    try {
      const input = CreateProjectSchema.parse(req.body);
      const project = await registry.submit(input);

      res.status(202).json({
        success: true,
        projectId: project.id,
        slug: project.slug,
        state: project.state,
      });
    } catch (error) {
      if (error instanceof z.ZodError) {
        sendErrorResponse(res, 400, 'Invalid request parameters', { validationErrors: error.errors });
      } else if (error instanceof InvalidBriefError) {
        sendErrorResponse(res, 400, error.message, { code: error.code, field: error.field });
      } else {
        sendErrorResponse(res, 500, 'Failed to start project', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  });

  /**
   * GET /projects/:projectId
   * Latest snapshot of the project
   */
  router.get('/:projectId', async (req, res) => {
    const { projectId } = req.params;
    try {
      const snapshot = await snapshots.get(projectId);
      if (!snapshot) {
        sendErrorResponse(res, 404, 'Project not found', { projectId });
        return;
      }
      res.json({ success: true, running: registry.isRunning(projectId), snapshot });
    } catch (error) {
      sendErrorResponse(res, 500, 'Failed to load project', {
        projectId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  /**
   * POST /projects/:projectId/cancel
   * Abort a running project; finished projects answer 409
   */
  router.post('/:projectId/cancel', async (req, res) => {
    const { projectId } = req.params;
    try {
      if (registry.cancel(projectId) === 'cancelled') {
        res.status(202).json({ success: true, projectId, message: 'Cancellation requested' });
        return;
      }

      const snapshot = await snapshots.get(projectId);
      if (!snapshot) {
        sendErrorResponse(res, 404, 'Project not found', { projectId });
        return;
      }
      sendErrorResponse(res, 409, `Project is not running (state: ${snapshot.state})`, {
        projectId,
        state: snapshot.state,
      });
    } catch (error) {
      sendErrorResponse(res, 500, 'Failed to cancel project', {
        projectId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return router;
}
