import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { closeWorkflowsDatabaseConnection, getWorkflowsDatabase } from './workflows-db.js';
import { logger } from '@/config/logger.js';

async function runWorkflowsMigrations(): Promise<void> {
  try {
    logger.info('Starting workflows database migrations...');
    await migrate(getWorkflowsDatabase(), { migrationsFolder: './drizzle-workflows' });
    logger.info('Workflows database migrations completed successfully');
  } catch (error) {
    logger.error('Workflows database migration failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  } finally {
    await closeWorkflowsDatabaseConnection();
  }
}

if (require.main === module) {
  void runWorkflowsMigrations();
}
