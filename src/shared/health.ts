import { sql } from 'drizzle-orm';
import { getWorkflowsDatabase } from '@/db/workflows-db.js';
import { logger } from '@/config/logger.js';

export interface ComponentHealth {
  status: 'healthy' | 'unhealthy';
  message: string;
  responseTime?: number;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  service: string;
  timestamp: string;
  environment: string;
  version: string;
  activeProjects: number;
  checks: {
    snapshotStore: ComponentHealth;
  };
}

export interface HealthServiceOptions {
  snapshotStore: 'memory' | 'postgres';
  activeProjects: () => number;
}

export class HealthService {
  private readonly serviceName = 'picture-book-workflow';
  private readonly version = '0.1.0';

  constructor(private readonly options: HealthServiceOptions) {}

  async checkHealth(environment: string): Promise<HealthStatus> {
    const snapshotStore =
      this.options.snapshotStore === 'postgres'
        ? await this.checkWorkflowsDatabaseHealth()
        : { status: 'healthy' as const, message: 'In-memory snapshot store' };

    return {
      status: snapshotStore.status,
      service: this.serviceName,
      timestamp: new Date().toISOString(),
      environment,
      version: this.version,
      activeProjects: this.options.activeProjects(),
      checks: { snapshotStore },
    };
  }

  private async checkWorkflowsDatabaseHealth(): Promise<ComponentHealth> {
    const startTime = Date.now();

    try {
      await getWorkflowsDatabase().execute(sql`SELECT 1 as health_check`);
      const responseTime = Date.now() - startTime;
      logger.debug(`Workflows database health check successful (${responseTime}ms)`);

      return {
        status: 'healthy',
        message: 'Workflows database connection successful',
        responseTime,
      };
    } catch (error) {
      const responseTime = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown workflows database error';
      logger.error(`Workflows database health check failed (${responseTime}ms)`, { error: errorMessage });

      return {
        status: 'unhealthy',
        message: `Workflows database connection failed: ${errorMessage}`,
        responseTime,
      };
    }
  }
}
