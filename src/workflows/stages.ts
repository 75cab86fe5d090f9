/**
 * Stage Registry
 * Ordered pipeline stages, workflow statuses and task priorities.
 */

import {
  PIPELINE_STAGES,
  TASK_PRIORITIES,
  WORKFLOW_STATUSES,
  type PipelineStage,
  type TaskPriority,
  type WorkflowStatus,
} from '@/shared/types.js';

export { PIPELINE_STAGES, TASK_PRIORITIES, WORKFLOW_STATUSES };

export const TERMINAL_STAGE: PipelineStage = 'analyzed';

export function isPipelineStage(value: string): value is PipelineStage {
  return (PIPELINE_STAGES as readonly string[]).includes(value);
}

export function isWorkflowStatus(value: string): value is WorkflowStatus {
  return (WORKFLOW_STATUSES as readonly string[]).includes(value);
}

export function isTaskPriority(value: string): value is TaskPriority {
  return (TASK_PRIORITIES as readonly string[]).includes(value);
}

/** Position in the pipeline, or -1 for an unrecognized stage. */
export function stageIndex(stage: string): number {
  return (PIPELINE_STAGES as readonly string[]).indexOf(stage);
}

/**
 * Stage immediately after `current`; null when `current` is terminal or unknown.
 */
export function nextStage(current: string): PipelineStage | null {
  const index = stageIndex(current);
  if (index === -1) {
    return null;
  }
  return PIPELINE_STAGES[index + 1] ?? null;
}

export function hasReachedStage(current: string, target: PipelineStage): boolean {
  const index = stageIndex(current);
  return index !== -1 && index >= stageIndex(target);
}

export function nextWorkflowStatus(current: string): WorkflowStatus | null {
  const index = (WORKFLOW_STATUSES as readonly string[]).indexOf(current);
  if (index === -1) {
    return null;
  }
  return WORKFLOW_STATUSES[index + 1] ?? null;
}

// Workflows move strictly forward one status at a time.
export function canTransitionWorkflow(from: string, to: string): boolean {
  return nextWorkflowStatus(from) === to;
}

export function emptyStageCounts(): Record<PipelineStage, number> {
  return {
    idea: 0,
    outlined: 0,
    drafted: 0,
    scripted: 0,
    recorded: 0,
    edited: 0,
    reviewed: 0,
    scheduled: 0,
    published: 0,
    analyzed: 0,
  };
}

export interface PriorityDisplay {
  weight: number;
  icon: string;
  label: string;
}

const PRIORITY_DISPLAY: Record<TaskPriority, PriorityDisplay> = {
  low: { weight: 1, icon: 'green', label: 'Low' },
  medium: { weight: 2, icon: 'yellow', label: 'Medium' },
  high: { weight: 3, icon: 'orange', label: 'High' },
  urgent: { weight: 4, icon: 'red', label: 'Urgent' },
};

const UNKNOWN_PRIORITY: PriorityDisplay = { weight: 0, icon: 'unknown', label: 'Unknown' };

/** Presentation-only ordering and marker for a task priority. */
export function priorityWeight(priority: string): PriorityDisplay {
  return isTaskPriority(priority) ? PRIORITY_DISPLAY[priority] : UNKNOWN_PRIORITY;
}
