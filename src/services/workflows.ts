/**
 * Workflow Service
 * Planned-to-published workflows with their default task checklists
 */

import { z } from 'zod';
import { logger } from '@/config/logger.js';
import {
  invalidTransitionError,
  notFoundError,
  validationError,
} from '@/shared/errors.js';
import { isEntityId } from '@/shared/ids.js';
import type { IWorkflowRepository, IWorkflowTaskRepository } from '@/shared/interfaces.js';
import { fail, ok, type Result } from '@/shared/result.js';
import {
  WORKFLOW_STATUSES,
  WORKFLOW_TASK_STATUSES,
  type Workflow,
  type WorkflowStatus,
  type WorkflowTask,
  type WorkflowTaskStatus,
} from '@/shared/types.js';
import { canTransitionWorkflow } from '@/workflows/stages.js';
import { getDefaultTaskTitles } from '@/workflows/task-templates.js';
import { computeWorkflowMetrics, type WorkflowMetrics } from './metrics.js';

export const CreateWorkflowSchema = z.object({
  userId: z.string().uuid(),
  title: z.string().trim().min(1, 'Title is required'),
  contentType: z.string().trim().min(1, 'Content type is required'),
  platforms: z.array(z.string().trim().min(1)).default([]),
  targetDate: z.string().datetime({ offset: true }).nullish(),
});

export type CreateWorkflowInput = z.input<typeof CreateWorkflowSchema>;

export const WorkflowStatusSchema = z.enum(WORKFLOW_STATUSES);
export const WorkflowTaskStatusSchema = z.enum(WORKFLOW_TASK_STATUSES);

export interface CreatedWorkflow {
  workflow: Workflow;
  tasks: WorkflowTask[];
  /** Non-fatal problems, such as a checklist that could not be fully created. */
  warnings: string[];
}

export interface WorkflowServiceDeps {
  workflows: IWorkflowRepository;
  workflowTasks: IWorkflowTaskRepository;
  now?: () => Date;
}

export class WorkflowService {
  private readonly workflows: IWorkflowRepository;
  private readonly workflowTasks: IWorkflowTaskRepository;
  private readonly now: () => Date;

  constructor(deps: WorkflowServiceDeps) {
    this.workflows = deps.workflows;
    this.workflowTasks = deps.workflowTasks;
    this.now = deps.now ?? (() => new Date());
  }

  listWorkflows(userId: string): Promise<Result<Workflow[]>> {
    return this.workflows.list({ userId }, { field: 'createdAt', direction: 'desc' });
  }

  /**
   * Create a workflow in `planned` and attach the default checklist for its
   * content type. A failed task insert stops the checklist but keeps the
   * workflow; the failure is reported in `warnings`.
   */
  async createWorkflow(input: CreateWorkflowInput): Promise<Result<CreatedWorkflow>> {
    const parsed = CreateWorkflowSchema.safeParse(input);
    if (!parsed.success) {
      return fail(validationError(parsed.error));
    }

    const { userId, title, contentType, platforms, targetDate } = parsed.data;

    const created = await this.workflows.insert({
      userId,
      title,
      contentType,
      platforms,
      targetDate: targetDate ?? null,
      status: 'planned',
    });
    if (!created.success) {
      return created;
    }

    const workflow = created.data;
    const tasks: WorkflowTask[] = [];
    const warnings: string[] = [];
    const titles = getDefaultTaskTitles(contentType);

    for (const [orderIndex, taskTitle] of titles.entries()) {
      const inserted = await this.workflowTasks.insert({
        workflowId: workflow.id,
        title: taskTitle,
        orderIndex,
        status: 'pending',
      });

      if (!inserted.success) {
        warnings.push(`Could not create default tasks: ${inserted.error.message}`);
        logger.warn('Default task creation stopped', {
          workflowId: workflow.id,
          createdTasks: tasks.length,
          expectedTasks: titles.length,
        });
        break;
      }

      tasks.push(inserted.data);
    }

    logger.info('Workflow created', {
      workflowId: workflow.id,
      userId,
      contentType,
      taskCount: tasks.length,
    });

    return ok({ workflow, tasks, warnings });
  }

  async updateStatus(
    userId: string,
    workflowId: string,
    status: string,
  ): Promise<Result<Workflow>> {
    const parsedStatus = WorkflowStatusSchema.safeParse(status);
    if (!parsedStatus.success) {
      return fail(validationError(parsedStatus.error));
    }

    const found = await this.findOwnedWorkflow(userId, workflowId);
    if (!found.success) {
      return found;
    }

    const from: WorkflowStatus = found.data.status;
    const to = parsedStatus.data;
    if (!canTransitionWorkflow(from, to)) {
      return fail(invalidTransitionError('Workflow', from, to));
    }

    const updated = await this.workflows.update(workflowId, { status: to });
    if (!updated.success) {
      return updated;
    }
    if (!updated.data) {
      return fail(notFoundError('Workflow', workflowId));
    }

    logger.info('Workflow status updated', { workflowId, from, to });
    return ok(updated.data);
  }

  async deleteWorkflow(userId: string, workflowId: string): Promise<Result<{ id: string }>> {
    const found = await this.findOwnedWorkflow(userId, workflowId);
    if (!found.success) {
      return found;
    }

    const deleted = await this.workflows.delete(workflowId);
    if (!deleted.success) {
      return deleted;
    }
    if (!deleted.data) {
      return fail(notFoundError('Workflow', workflowId));
    }
    return ok({ id: workflowId });
  }

  async listTasks(userId: string, workflowId: string): Promise<Result<WorkflowTask[]>> {
    const found = await this.findOwnedWorkflow(userId, workflowId);
    if (!found.success) {
      return found;
    }
    return this.workflowTasks.list({ workflowId }, { field: 'orderIndex', direction: 'asc' });
  }

  /**
   * Completion stamps `completedAt`; any other status clears it. Tasks are
   * owned through their workflow.
   */
  async updateTaskStatus(
    userId: string,
    taskId: string,
    status: string,
  ): Promise<Result<WorkflowTask>> {
    const parsedStatus = WorkflowTaskStatusSchema.safeParse(status);
    if (!parsedStatus.success) {
      return fail(validationError(parsedStatus.error));
    }
    if (!isEntityId(taskId)) {
      return fail(notFoundError('Workflow task', taskId));
    }

    const task = await this.workflowTasks.findById(taskId);
    if (!task.success) {
      return task;
    }
    if (!task.data) {
      return fail(notFoundError('Workflow task', taskId));
    }
    const owner = await this.findOwnedWorkflow(userId, task.data.workflowId);
    if (!owner.success) {
      return owner.error.type === 'NOT_FOUND' ? fail(notFoundError('Workflow task', taskId)) : owner;
    }

    const next: WorkflowTaskStatus = parsedStatus.data;
    const updated = await this.workflowTasks.update(taskId, {
      status: next,
      completedAt: next === 'completed' ? this.now().toISOString() : null,
    });
    if (!updated.success) {
      return updated;
    }
    if (!updated.data) {
      return fail(notFoundError('Workflow task', taskId));
    }
    return ok(updated.data);
  }

  async computeDashboardMetrics(userId: string): Promise<Result<WorkflowMetrics>> {
    const listed = await this.listWorkflows(userId);
    if (!listed.success) {
      return listed;
    }
    return ok(computeWorkflowMetrics(listed.data));
  }

  /** A workflow of another user is reported exactly like a missing one. */
  private async findOwnedWorkflow(userId: string, workflowId: string): Promise<Result<Workflow>> {
    if (!isEntityId(workflowId)) {
      return fail(notFoundError('Workflow', workflowId));
    }

    const found = await this.workflows.findById(workflowId);
    if (!found.success) {
      return found;
    }
    if (!found.data || found.data.userId !== userId) {
      return fail(notFoundError('Workflow', workflowId));
    }
    return ok(found.data);
  }
}
