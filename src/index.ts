import type { Server } from 'http';
import { getEnvironment, validateEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { closeWorkflowsDatabaseConnection } from '@/db/workflows-db.js';
import { HealthService } from '@/shared/health.js';
import { createEngineFromEnvironment, getSnapshotStore } from '@/workflows/engine-factory.js';
import { ProjectRegistry } from '@/workflows/project-registry.js';
import { createApp } from './app.js';

validateEnvironment();
const env = getEnvironment();

async function startServer(): Promise<void> {
  const engine = createEngineFromEnvironment();
  const registry = new ProjectRegistry(engine);
  const snapshots = getSnapshotStore();
  const app = createApp({
    registry,
    snapshots,
    health: new HealthService({ snapshotStore: env.SNAPSHOT_STORE, activeProjects: () => registry.size }),
    environment: env.NODE_ENV,
  });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(env.PORT, () => {
      logger.info('Picture Book Workflow Service started', {
        environment: env.NODE_ENV,
        port: env.PORT,
        textProvider: env.TEXT_PROVIDER,
        imageModel: env.GOOGLE_GENAI_IMAGE_MODEL,
        artifactStore: env.ARTIFACT_STORE,
        snapshotStore: env.SNAPSHOT_STORE,
      });
      resolve(listening);
    });
    listening.on('error', reject);
  });

  setupGracefulShutdown(server, registry);
}

function setupGracefulShutdown(server: Server, registry: ProjectRegistry): void {
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`, { activeProjects: registry.size });
    server.close(() => {
      registry
        .shutdown()
        .then(() => closeWorkflowsDatabaseConnection())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.error('Server failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
