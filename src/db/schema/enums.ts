import { pgEnum } from "drizzle-orm/pg-core";
import {
  CONTENT_TASK_STATUSES,
  PIPELINE_STAGES,
  TASK_PRIORITIES,
  WORKFLOW_STATUSES,
  WORKFLOW_TASK_STATUSES,
} from '../../shared/types.js';

// -----------------------------------------------------------------------------
// Enumerated types
// -----------------------------------------------------------------------------

export const workflowStatusEnum = pgEnum("workflow_status", WORKFLOW_STATUSES);
export const workflowTaskStatusEnum = pgEnum("workflow_task_status", WORKFLOW_TASK_STATUSES);
export const pipelineStageEnum = pgEnum("workflow_stage", PIPELINE_STAGES);
export const taskPriorityEnum = pgEnum("task_priority", TASK_PRIORITIES);
export const contentTaskStatusEnum = pgEnum("content_task_status", CONTENT_TASK_STATUSES);
