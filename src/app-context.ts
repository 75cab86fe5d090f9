/**
 * Service wiring
 * Builds every service once and hands them to the HTTP layer.
 */

import { sql } from 'drizzle-orm';
import { AIGateway } from '@/ai/gateway.js';
import { createDrizzleRepositories, type Repositories } from '@/adapters/database/index.js';
import { aiProviderConfig, getEnvironment } from '@/config/environment.js';
import { getDatabase } from '@/db/connection.js';
import { ContentGenerationService } from '@/services/content-generation.js';
import { ContentPipelineService } from '@/services/content-pipeline.js';
import { WorkflowService } from '@/services/workflows.js';
import { HealthService } from '@/shared/health.js';

export interface AppContext {
  environment: string;
  apiKey: string | undefined;
  workflowService: WorkflowService;
  pipelineService: ContentPipelineService;
  generationService: ContentGenerationService;
  healthService: HealthService;
}

export interface AppContextParts {
  environment: string;
  apiKey: string | undefined;
  repositories: Repositories;
  gateway: AIGateway;
  probeDatabase: () => Promise<void>;
  databaseHost: string;
}

export function buildAppContext(parts: AppContextParts): AppContext {
  const { repositories, gateway } = parts;

  return {
    environment: parts.environment,
    apiKey: parts.apiKey,
    workflowService: new WorkflowService({
      workflows: repositories.workflows,
      workflowTasks: repositories.workflowTasks,
    }),
    pipelineService: new ContentPipelineService({
      projects: repositories.projects,
      pipeline: repositories.pipeline,
      contentTasks: repositories.contentTasks,
      analytics: repositories.analytics,
      dashboard: repositories.dashboard,
    }),
    generationService: new ContentGenerationService({ gateway }),
    healthService: new HealthService({
      probeDatabase: parts.probeDatabase,
      databaseHost: parts.databaseHost,
      listProviders: () => gateway.getAvailableProviders(),
    }),
  };
}

/** Production wiring: Postgres through Drizzle and the configured AI providers. */
export function createAppContext(): AppContext {
  const env = getEnvironment();
  const db = getDatabase();

  return buildAppContext({
    environment: env.NODE_ENV,
    apiKey: env.CONTENT_WORKFLOW_API_KEY,
    repositories: createDrizzleRepositories(db),
    gateway: AIGateway.fromConfig(aiProviderConfig.get()),
    probeDatabase: async () => {
      await db.execute(sql`SELECT 1 as health_check`);
    },
    databaseHost: env.DB_HOST,
  });
}
