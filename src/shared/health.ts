import { logger } from '@/config/logger.js';

export type CheckStatus = 'healthy' | 'unhealthy';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  service: string;
  timestamp: string;
  environment: string;
  version: string;
  checks: {
    database: {
      status: CheckStatus;
      message: string;
      host: string;
      responseTime?: number;
    };
    textGeneration: {
      status: CheckStatus;
      message: string;
      providers: string[];
    };
  };
}

export interface HealthServiceDeps {
  /** Resolves when the store answers a trivial query. */
  probeDatabase: () => Promise<void>;
  databaseHost: string;
  listProviders: () => string[];
}

export class HealthService {
  private readonly serviceName = 'content-workflow-service';
  private readonly version = '0.1.0';

  constructor(private readonly deps: HealthServiceDeps) {}

  async checkHealth(environment: string): Promise<HealthStatus> {
    const timestamp = new Date().toISOString();

    const databaseCheck = await this.checkDatabaseHealth();
    const textGenerationCheck = this.checkTextGeneration();

    // Generation being unavailable still leaves the workflow API usable
    const overallStatus =
      databaseCheck.status === 'unhealthy'
        ? 'unhealthy'
        : textGenerationCheck.status === 'healthy'
          ? 'healthy'
          : 'degraded';

    return {
      status: overallStatus,
      service: this.serviceName,
      timestamp,
      environment,
      version: this.version,
      checks: {
        database: databaseCheck,
        textGeneration: textGenerationCheck,
      },
    };
  }

  private async checkDatabaseHealth(): Promise<HealthStatus['checks']['database']> {
    const startTime = Date.now();

    try {
      await this.deps.probeDatabase();

      const responseTime = Date.now() - startTime;

      logger.debug(`Database health check successful (${responseTime}ms)`);

      return {
        status: 'healthy',
        message: 'Database connection successful',
        host: this.deps.databaseHost,
        responseTime,
      };
    } catch (error) {
      const responseTime = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : 'Unknown database error';

      logger.error(`Database health check failed (${responseTime}ms)`, { error: errorMessage });
      return {
        status: 'unhealthy',
        message: `Database connection failed: ${errorMessage}`,
        host: this.deps.databaseHost,
        responseTime,
      };
    }
  }

  private checkTextGeneration(): HealthStatus['checks']['textGeneration'] {
    const providers = this.deps.listProviders();
    return providers.length > 0
      ? { status: 'healthy', message: `${providers.length} text provider(s) available`, providers }
      : { status: 'unhealthy', message: 'No text generation providers configured', providers };
  }
}
