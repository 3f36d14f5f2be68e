import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { databaseConfig, getEnvironment } from '@/config/environment.js';
import * as workflowsSchema from './workflows-schema/index.js';

export type WorkflowsDatabase = NodePgDatabase<typeof workflowsSchema>;

let workflowsPool: Pool | null = null;
let workflowsDb: WorkflowsDatabase | null = null;

export function getWorkflowsDatabase(): WorkflowsDatabase {
  if (!workflowsDb) {
    const { host, port, user, password, database, ssl } = databaseConfig.get();

    if (!host || !user || !password || !database) {
      throw new Error(
        'Missing required database environment variables: DB_HOST, DB_USER, DB_PASSWORD, WORKFLOWS_DB',
      );
    }

    workflowsPool = new Pool({
      host,
      port,
      user,
      password,
      database,
      ssl,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    workflowsDb = drizzle(workflowsPool, {
      schema: workflowsSchema,
      logger: getEnvironment().NODE_ENV === 'development',
    });
  }

  return workflowsDb;
}

export async function closeWorkflowsDatabaseConnection(): Promise<void> {
  if (workflowsPool) {
    const pool = workflowsPool;
    workflowsPool = null;
    workflowsDb = null;
    await pool.end();
  }
}

export * from './workflows-schema/index.js';
