import express from 'express';
import helmet from 'helmet';
import { logger } from '@/config/logger.js';
import type { ISnapshotStore } from '@/services/snapshot-store.js';
import type { HealthService } from '@/shared/health.js';
import type { ProjectRegistry } from '@/workflows/project-registry.js';
import { createProjectsRouter } from './routes/projects.js';

export interface AppDependencies {
  registry: ProjectRegistry;
  snapshots: ISnapshotStore;
  health: HealthService;
  environment: string;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', async (_req, res) => {
    try {
      const healthStatus = await deps.health.checkHealth(deps.environment);
      res.status(healthStatus.status === 'healthy' ? 200 : 503).json(healthStatus);
    } catch (error) {
      logger.error('Health check endpoint error', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({
        status: 'unhealthy',
        service: 'picture-book-workflow',
        timestamp: new Date().toISOString(),
        environment: deps.environment,
      });
    }
  });

  app.get('/', (_req, res) => {
    res.json({
      message: 'Picture Book Workflow Service',
      version: '0.1.0',
      environment: deps.environment,
    });
  });

  app.use('/projects', createProjectsRouter({ registry: deps.registry, snapshots: deps.snapshots }));

  // Error handling middleware
  app.use((error: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error', { error: error.message, stack: error.stack });
    res.status(500).json({
      error: 'Internal server error',
      message: deps.environment === 'development' ? error.message : 'Something went wrong',
    });
  });

  // 404 handler
  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  return app;
}
