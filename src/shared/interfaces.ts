// -----------------------------------------------------------------------------
// Shared Interfaces - Store adapter contracts the engine depends on
// These can be swapped with in-memory implementations for testing
// -----------------------------------------------------------------------------

import type { Result } from './result.js';
import type {
  AnalyticsRecord,
  ContentProject,
  ContentProjectPatch,
  ContentTask,
  ContentTaskPatch,
  ContentTaskStatus,
  DashboardSummary,
  NewAnalyticsRecord,
  NewContentProject,
  NewContentTask,
  NewPipelineItem,
  NewWorkflow,
  NewWorkflowTask,
  PipelineItem,
  PipelineItemPatch,
  PipelineStage,
  Workflow,
  WorkflowPatch,
  WorkflowTask,
  WorkflowTaskPatch,
} from './types.js';

export type SortDirection = 'asc' | 'desc';

export interface ListOrder<TField extends string> {
  field: TField;
  direction?: SortDirection;
}

/**
 * Capability set every table adapter offers. Each call is a single round trip
 * to the store; there is no batching and no optimistic locking.
 */
export interface IEntityRepository<TRecord, TNew, TPatch, TFilter, TOrderField extends string> {
  list(filter: TFilter, order?: ListOrder<TOrderField>): Promise<Result<TRecord[]>>;
  findById(id: string): Promise<Result<TRecord | null>>;
  insert(record: TNew): Promise<Result<TRecord>>;
  /** Resolves `null` when no record matched `id`. */
  update(id: string, patch: TPatch): Promise<Result<TRecord | null>>;
  /** Resolves `false` when no record matched `id`. */
  delete(id: string): Promise<Result<boolean>>;
}

export interface WorkflowFilter {
  userId: string;
  status?: Workflow['status'];
}

export interface WorkflowTaskFilter {
  workflowId: string;
}

export interface ContentProjectFilter {
  userId: string;
}

export interface PipelineFilter {
  userId: string;
  stage?: PipelineStage;
}

export interface ContentTaskFilter {
  userId: string;
  status?: ContentTaskStatus;
  contentPipelineId?: string;
}

export interface AnalyticsFilter {
  contentPipelineIds: string[];
}

export type IWorkflowRepository = IEntityRepository<
  Workflow,
  NewWorkflow,
  WorkflowPatch,
  WorkflowFilter,
  'createdAt' | 'targetDate' | 'title'
>;

export type IWorkflowTaskRepository = IEntityRepository<
  WorkflowTask,
  NewWorkflowTask,
  WorkflowTaskPatch,
  WorkflowTaskFilter,
  'orderIndex' | 'createdAt'
>;

export type IContentProjectRepository = IEntityRepository<
  ContentProject,
  NewContentProject,
  ContentProjectPatch,
  ContentProjectFilter,
  'createdAt' | 'startDate'
>;

export type IPipelineRepository = IEntityRepository<
  PipelineItem,
  NewPipelineItem,
  PipelineItemPatch,
  PipelineFilter,
  'createdAt' | 'scheduledPublishDate'
>;

export type IContentTaskRepository = IEntityRepository<
  ContentTask,
  NewContentTask,
  ContentTaskPatch,
  ContentTaskFilter,
  'dueDate' | 'createdAt'
>;

/** Analytics records are append-only; there is no update path. */
export interface IAnalyticsRepository {
  list(filter: AnalyticsFilter): Promise<Result<AnalyticsRecord[]>>;
  insert(record: NewAnalyticsRecord): Promise<Result<AnalyticsRecord>>;
}

/** Remote aggregate procedure exposed by the store. */
export interface IDashboardSummarySource {
  fetchDashboardSummary(userId: string): Promise<Result<DashboardSummary>>;
}
