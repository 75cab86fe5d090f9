import type { Database } from '@/db/connection.js';
import type {
  IAnalyticsRepository,
  IContentProjectRepository,
  IContentTaskRepository,
  IDashboardSummarySource,
  IPipelineRepository,
  IWorkflowRepository,
  IWorkflowTaskRepository,
} from '@/shared/interfaces.js';
import {
  DrizzleAnalyticsRepository,
  DrizzleContentProjectRepository,
  DrizzleContentTaskRepository,
  DrizzleDashboardSummarySource,
  DrizzlePipelineRepository,
} from './content-repository.js';
import { DrizzleWorkflowRepository, DrizzleWorkflowTaskRepository } from './workflow-repository.js';

export interface Repositories {
  workflows: IWorkflowRepository;
  workflowTasks: IWorkflowTaskRepository;
  projects: IContentProjectRepository;
  pipeline: IPipelineRepository;
  contentTasks: IContentTaskRepository;
  analytics: IAnalyticsRepository;
  dashboard: IDashboardSummarySource;
}

export function createDrizzleRepositories(db: Database): Repositories {
  return {
    workflows: new DrizzleWorkflowRepository(db),
    workflowTasks: new DrizzleWorkflowTaskRepository(db),
    projects: new DrizzleContentProjectRepository(db),
    pipeline: new DrizzlePipelineRepository(db),
    contentTasks: new DrizzleContentTaskRepository(db),
    analytics: new DrizzleAnalyticsRepository(db),
    dashboard: new DrizzleDashboardSummarySource(db),
  };
}

export {
  DrizzleAnalyticsRepository,
  DrizzleContentProjectRepository,
  DrizzleContentTaskRepository,
  DrizzleDashboardSummarySource,
  DrizzlePipelineRepository,
  DrizzleWorkflowRepository,
  DrizzleWorkflowTaskRepository,
};
