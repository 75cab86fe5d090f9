import { Router } from 'express';
import type { ContentGenerationService } from '@/services/content-generation.js';
import { asyncRoute, queryString, sendResult } from './respond.js';

export function createContentRouter(generationService: ContentGenerationService): Router {
  const router = Router();

  /**
   * GET /content/models
   * Models whose provider is configured, with cost per 1K tokens
   */
  router.get('/models', (_req, res) => {
    res.json({ success: true, data: generationService.listModels() });
  });

  router.get('/segments', (_req, res) => {
    res.json({ success: true, data: generationService.listSegments() });
  });

  /**
   * GET /content/estimate?model=gpt-4o-mini&days=7
   */
  router.get('/estimate', (req, res) => {
    const days = Number(queryString(req.query.days) ?? '7');
    sendResult(
      res,
      generationService.estimateCalendarCost(queryString(req.query.model) ?? '', days),
    );
  });

  /**
   * POST /content/calendar
   * Generate a multi-day, multi-platform content calendar
   */
  router.post('/calendar', asyncRoute(async (req, res) => {
    sendResult(res, await generationService.generateCalendar(req.body ?? {}));
  }));

  router.post('/scripts', asyncRoute(async (req, res) => {
    sendResult(res, await generationService.generateVideoScripts(req.body ?? {}));
  }));

  // AI tool discovery

  router.get('/tools', (_req, res) => {
    res.json({ success: true, data: generationService.listToolCategories() });
  });

  /**
   * GET /content/tools/search?q=voice&category=Video%20%26%20Audio
   * Empty query lists every tool of the category
   */
  router.get('/tools/search', (req, res) => {
    res.json({
      success: true,
      data: generationService.searchTools(
        queryString(req.query.q) ?? '',
        queryString(req.query.category),
      ),
    });
  });

  router.post('/tools/compare', asyncRoute(async (req, res) => {
    sendResult(res, await generationService.generateToolComparison(req.body ?? {}));
  }));

  router.post('/tools/tutorial', asyncRoute(async (req, res) => {
    sendResult(res, await generationService.generateToolTutorial(req.body ?? {}));
  }));

  router.post('/tools/news', asyncRoute(async (req, res) => {
    sendResult(res, await generationService.generateToolNews(req.body ?? {}));
  }));

  return router;
}
