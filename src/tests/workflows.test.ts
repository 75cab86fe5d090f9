import { describe, it, expect, beforeEach } from '@jest/globals';
import { WorkflowService } from '../services/workflows';
import { getContentTypes, getDefaultTaskTitles } from '../workflows/task-templates';
import { createInMemoryRepositories, type InMemoryRepositories } from './helpers/in-memory-store';

const USER_ID = '11111111-1111-4111-8111-111111111111';
const OTHER_USER_ID = '66666666-6666-4666-8666-666666666666';
const UNKNOWN_ID = '99999999-9999-4999-8999-999999999999';
const FIXED_NOW = new Date('2025-03-01T12:00:00.000Z');

describe('WorkflowService', () => {
  let repositories: InMemoryRepositories;
  let service: WorkflowService;

  beforeEach(() => {
    repositories = createInMemoryRepositories();
    service = new WorkflowService({
      workflows: repositories.workflows,
      workflowTasks: repositories.workflowTasks,
      now: () => FIXED_NOW,
    });
  });

  const create = (contentType = 'Blog Post', platforms: string[] = ['Blog']) =>
    service.createWorkflow({
      userId: USER_ID,
      title: 'Spring launch',
      contentType,
      platforms,
      targetDate: '2025-04-01T09:00:00.000Z',
    });

  describe('createWorkflow', () => {
    it('creates the workflow in planned status', async () => {
      const result = await create();

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.workflow).toMatchObject({
        userId: USER_ID,
        title: 'Spring launch',
        contentType: 'Blog Post',
        platforms: ['Blog'],
        targetDate: '2025-04-01T09:00:00.000Z',
        status: 'planned',
      });
      expect(result.data.warnings).toEqual([]);
    });

    it.each(getContentTypes())('attaches the %s checklist with order indexes 0..N-1', async (contentType) => {
      const result = await create(contentType);

      expect(result.success).toBe(true);
      if (!result.success) return;
      const expected = getDefaultTaskTitles(contentType);
      expect(result.data.tasks.map((task) => task.title)).toEqual(expected);
      expect(result.data.tasks.map((task) => task.orderIndex)).toEqual(expected.map((_, i) => i));
      expect(result.data.tasks.every((task) => task.status === 'pending')).toBe(true);
    });

    it('attaches the generic 4-step checklist for an unknown content type', async () => {
      const result = await create('Webinar');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.tasks.map((task) => task.title)).toEqual([
        'Plan content',
        'Create content',
        'Review',
        'Publish',
      ]);
    });

    it('keeps the workflow and reports a warning when a task insert fails', async () => {
      repositories.workflowTasks.insertsBeforeFailure = 2;

      const result = await create('Newsletter');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.tasks).toHaveLength(2);
      expect(result.data.warnings).toEqual([
        'Could not create default tasks: Store operation insert on workflow_tasks failed: insert rejected',
      ]);
      expect(repositories.workflows.rows).toHaveLength(1);
    });

    it('rejects a blank title without touching the store', async () => {
      const result = await service.createWorkflow({
        userId: USER_ID,
        title: '   ',
        contentType: 'Blog Post',
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.type).toBe('VALIDATION_ERROR');
      expect(result.error.details).toMatchObject({ fieldErrors: { title: ['Title is required'] } });
      expect(repositories.workflows.rows).toHaveLength(0);
    });

    it('returns a store error when the workflow insert fails', async () => {
      repositories.workflows.failing.add('insert');

      const result = await create();

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.type).toBe('STORE_ERROR');
      expect(repositories.workflowTasks.rows).toHaveLength(0);
    });
  });

  describe('updateStatus', () => {
    it('moves planned -> in_progress -> published', async () => {
      const created = await create();
      if (!created.success) throw new Error('setup failed');
      const id = created.data.workflow.id;

      const started = await service.updateStatus(USER_ID, id, 'in_progress');
      const published = await service.updateStatus(USER_ID, id, 'published');

      expect(started.success && started.data.status).toBe('in_progress');
      expect(published.success && published.data.status).toBe('published');
    });

    it('rejects skipping a status', async () => {
      const created = await create();
      if (!created.success) throw new Error('setup failed');

      const result = await service.updateStatus(USER_ID, created.data.workflow.id, 'published');

      expect(result).toEqual({
        success: false,
        error: {
          type: 'INVALID_TRANSITION',
          message: 'Workflow cannot move from planned to published',
          details: { entity: 'Workflow', from: 'planned', to: 'published' },
          recoverable: false,
        },
      });
      expect(repositories.workflows.rows[0]?.status).toBe('planned');
    });

    it('rejects an unknown status value', async () => {
      const created = await create();
      if (!created.success) throw new Error('setup failed');

      const result = await service.updateStatus(USER_ID, created.data.workflow.id, 'archived');

      expect(!result.success && result.error.type).toBe('VALIDATION_ERROR');
    });

    it('reports a missing workflow', async () => {
      const result = await service.updateStatus(USER_ID, UNKNOWN_ID, 'in_progress');

      expect(!result.success && result.error).toMatchObject({
        type: 'NOT_FOUND',
        message: `Workflow ${UNKNOWN_ID} was not found`,
      });
    });

    it('tells a failed read apart from a missing workflow', async () => {
      repositories.workflows.failing.add('findById');

      const result = await service.updateStatus(USER_ID, UNKNOWN_ID, 'in_progress');

      expect(!result.success && result.error.type).toBe('STORE_ERROR');
    });

    it('treats a malformed id as not found without reading the store', async () => {
      repositories.workflows.failing.add('findById');

      const result = await service.updateStatus(USER_ID, 'missing-id', 'in_progress');

      expect(!result.success && result.error.type).toBe('NOT_FOUND');
    });

    it('hides workflows owned by another user', async () => {
      const created = await create();
      if (!created.success) throw new Error('setup failed');

      const result = await service.updateStatus(OTHER_USER_ID, created.data.workflow.id, 'in_progress');

      expect(!result.success && result.error.type).toBe('NOT_FOUND');
      expect(repositories.workflows.rows[0]?.status).toBe('planned');
    });
  });

  describe('tasks', () => {
    it('lists tasks by order index', async () => {
      const created = await create('Podcast Episode');
      if (!created.success) throw new Error('setup failed');

      const result = await service.listTasks(USER_ID, created.data.workflow.id);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.map((task) => task.orderIndex)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it('stamps completedAt on completion and clears it when reopened', async () => {
      const created = await create();
      if (!created.success) throw new Error('setup failed');
      const taskId = created.data.tasks[0]?.id ?? '';

      const completed = await service.updateTaskStatus(USER_ID, taskId, 'completed');
      expect(completed.success && completed.data.completedAt).toBe('2025-03-01T12:00:00.000Z');

      const reopened = await service.updateTaskStatus(USER_ID, taskId, 'in_progress');
      expect(reopened.success && reopened.data.completedAt).toBeNull();
    });

    it('reports a missing task', async () => {
      const result = await service.updateTaskStatus(USER_ID, UNKNOWN_ID, 'completed');

      expect(!result.success && result.error.type).toBe('NOT_FOUND');
    });

    it('hides tasks of a workflow owned by another user', async () => {
      const created = await create();
      if (!created.success) throw new Error('setup failed');
      const taskId = created.data.tasks[0]?.id ?? '';

      const listed = await service.listTasks(OTHER_USER_ID, created.data.workflow.id);
      const updated = await service.updateTaskStatus(OTHER_USER_ID, taskId, 'completed');

      expect(!listed.success && listed.error.type).toBe('NOT_FOUND');
      expect(!updated.success && updated.error).toMatchObject({
        type: 'NOT_FOUND',
        message: `Workflow task ${taskId} was not found`,
      });
      expect(repositories.workflowTasks.rows[0]?.status).toBe('pending');
    });
  });

  describe('deleteWorkflow', () => {
    it('deletes an existing workflow', async () => {
      const created = await create();
      if (!created.success) throw new Error('setup failed');

      const result = await service.deleteWorkflow(USER_ID, created.data.workflow.id);

      expect(result).toEqual({ success: true, data: { id: created.data.workflow.id } });
      expect(repositories.workflows.rows).toHaveLength(0);
    });

    it('reports a missing workflow', async () => {
      const result = await service.deleteWorkflow(USER_ID, UNKNOWN_ID);

      expect(!result.success && result.error.type).toBe('NOT_FOUND');
    });

    it('does not delete a workflow owned by another user', async () => {
      const created = await create();
      if (!created.success) throw new Error('setup failed');

      const result = await service.deleteWorkflow(OTHER_USER_ID, created.data.workflow.id);

      expect(!result.success && result.error.type).toBe('NOT_FOUND');
      expect(repositories.workflows.rows).toHaveLength(1);
    });
  });

  describe('computeDashboardMetrics', () => {
    it('aggregates the user workflows', async () => {
      await create('Blog Post', ['YouTube', 'Blog']);
      const second = await create('Video Script', ['YouTube']);
      if (!second.success) throw new Error('setup failed');
      await service.updateStatus(USER_ID, second.data.workflow.id, 'in_progress');

      const result = await service.computeDashboardMetrics(USER_ID);

      expect(result).toEqual({
        success: true,
        data: {
          total: 2,
          planned: 1,
          inProgress: 1,
          completed: 0,
          completionRate: 0,
          platformDistribution: { YouTube: 2, Blog: 1 },
          contentTypeDistribution: { 'Blog Post': 1, 'Video Script': 1 },
        },
      });
    });

    it('returns a store error instead of empty metrics when the read fails', async () => {
      repositories.workflows.failing.add('list');

      const result = await service.computeDashboardMetrics(USER_ID);

      expect(!result.success && result.error.type).toBe('STORE_ERROR');
    });
  });
});
