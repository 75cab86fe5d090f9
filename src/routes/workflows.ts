import { Router } from 'express';
import type { WorkflowService } from '@/services/workflows.js';
import { currentUserId, requireUser } from '@/middleware/apiKeyAuth.js';
import { asyncRoute, sendResult } from './respond.js';

export function createWorkflowRouter(workflowService: WorkflowService): Router {
  const router = Router();

  router.use(requireUser);

  /**
   * GET /workflows
   * Workflows of the current user, newest first
   */
  router.get('/', asyncRoute(async (_req, res) => {
    sendResult(res, await workflowService.listWorkflows(currentUserId(res)));
  }));

  /**
   * POST /workflows
   * Create a workflow with its default task checklist
   */
  router.post('/', asyncRoute(async (req, res) => {
    const result = await workflowService.createWorkflow({
      ...req.body,
      userId: currentUserId(res),
    });
    sendResult(res, result, 201);
  }));

  /**
   * GET /workflows/metrics
   * Status counts, completion rate and distributions for the dashboard
   */
  router.get('/metrics', asyncRoute(async (_req, res) => {
    sendResult(res, await workflowService.computeDashboardMetrics(currentUserId(res)));
  }));

  router.patch('/tasks/:taskId', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await workflowService.updateTaskStatus(
        currentUserId(res),
        req.params.taskId,
        req.body?.status,
      ),
    );
  }));

  router.patch('/:id/status', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await workflowService.updateStatus(currentUserId(res), req.params.id, req.body?.status),
    );
  }));

  router.delete('/:id', asyncRoute(async (req, res) => {
    sendResult(res, await workflowService.deleteWorkflow(currentUserId(res), req.params.id));
  }));

  router.get('/:id/tasks', asyncRoute(async (req, res) => {
    sendResult(res, await workflowService.listTasks(currentUserId(res), req.params.id));
  }));

  return router;
}
