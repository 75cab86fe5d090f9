import { Router } from 'express';
import type { ContentPipelineService } from '@/services/content-pipeline.js';
import { currentUserId, requireUser } from '@/middleware/apiKeyAuth.js';
import { PIPELINE_STAGES, priorityWeight } from '@/workflows/stages.js';
import { TASK_PRIORITIES } from '@/shared/types.js';
import { asyncRoute, queryString, sendResult } from './respond.js';

export function createPipelineRouter(pipelineService: ContentPipelineService): Router {
  const router = Router();

  /**
   * GET /pipeline/stages
   * Stage order and priority markers used by clients
   */
  router.get('/stages', (_req, res) => {
    res.json({
      success: true,
      data: {
        stages: PIPELINE_STAGES,
        priorities: TASK_PRIORITIES.map((priority) => ({ priority, ...priorityWeight(priority) })),
      },
    });
  });

  router.use(requireUser);

  // Projects

  router.get('/projects', asyncRoute(async (_req, res) => {
    sendResult(res, await pipelineService.listProjects(currentUserId(res)));
  }));

  router.post('/projects', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await pipelineService.createProject({ ...req.body, userId: currentUserId(res) }),
      201,
    );
  }));

  // Pipeline items

  router.get('/items', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await pipelineService.getPipeline(currentUserId(res), queryString(req.query.stage)),
    );
  }));

  router.post('/items', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await pipelineService.addContent({ ...req.body, userId: currentUserId(res) }),
      201,
    );
  }));

  router.post('/items/:id/advance', asyncRoute(async (req, res) => {
    sendResult(res, await pipelineService.advanceStage(currentUserId(res), req.params.id));
  }));

  router.post('/items/:id/publication', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await pipelineService.recordPublication(currentUserId(res), req.params.id, req.body ?? {}),
    );
  }));

  router.post('/items/:id/metrics', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await pipelineService.recordPerformance(currentUserId(res), req.params.id, req.body ?? {}),
      201,
    );
  }));

  /**
   * GET /pipeline/calendar
   * Scheduled items, soonest first
   */
  router.get('/calendar', asyncRoute(async (_req, res) => {
    sendResult(res, await pipelineService.getScheduledContent(currentUserId(res)));
  }));

  // Tasks

  router.get('/tasks', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await pipelineService.listTasks(currentUserId(res), queryString(req.query.status)),
    );
  }));

  router.post('/tasks', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await pipelineService.createTask({ ...req.body, userId: currentUserId(res) }),
      201,
    );
  }));

  router.post('/tasks/:id/start', asyncRoute(async (req, res) => {
    sendResult(res, await pipelineService.startTask(currentUserId(res), req.params.id));
  }));

  router.post('/tasks/:id/complete', asyncRoute(async (req, res) => {
    sendResult(
      res,
      await pipelineService.completeTask(currentUserId(res), req.params.id, req.body?.actualHours),
    );
  }));

  // Summaries

  router.get('/dashboard', asyncRoute(async (_req, res) => {
    sendResult(res, await pipelineService.getDashboardSummary(currentUserId(res)));
  }));

  router.get('/performance', asyncRoute(async (_req, res) => {
    const userId = currentUserId(res);
    const [performance, stageCounts] = await Promise.all([
      pipelineService.getPerformanceSummary(userId),
      pipelineService.getStageCounts(userId),
    ]);
    if (!performance.success) {
      sendResult(res, performance);
      return;
    }
    if (!stageCounts.success) {
      sendResult(res, stageCounts);
      return;
    }
    sendResult(res, { success: true, data: { ...performance.data, stageCounts: stageCounts.data } });
  }));

  return router;
}
