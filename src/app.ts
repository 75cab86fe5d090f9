import express from 'express';
import helmet from 'helmet';
import { logger } from '@/config/logger.js';
import type { AppContext } from './app-context.js';
import { createApiKeyAuth } from './middleware/apiKeyAuth.js';
import { createContentRouter } from './routes/content.js';
import { createPipelineRouter } from './routes/pipeline.js';
import { createWorkflowRouter } from './routes/workflows.js';

export function createApp(context: AppContext): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/health', async (_req, res) => {
    try {
      const healthStatus = await context.healthService.checkHealth(context.environment);
      const statusCode = healthStatus.status === 'unhealthy' ? 503 : 200;
      res.status(statusCode).json(healthStatus);
    } catch (error) {
      logger.error('Health check endpoint error', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({
        status: 'unhealthy',
        service: 'content-workflow-service',
        timestamp: new Date().toISOString(),
        environment: context.environment,
      });
    }
  });

  app.get('/', (_req, res) => {
    res.json({
      message: 'Content Workflow Service',
      version: '0.1.0',
      environment: context.environment,
    });
  });

  // Every API route requires x-api-key
  const apiKeyAuth = createApiKeyAuth(context.apiKey);
  logger.info(`API key configured for API routes: ${Boolean((context.apiKey || '').trim())}`);

  app.use('/workflows', apiKeyAuth, createWorkflowRouter(context.workflowService));
  app.use('/pipeline', apiKeyAuth, createPipelineRouter(context.pipelineService));
  app.use('/content', apiKeyAuth, createContentRouter(context.generationService));

  // Error handling middleware
  app.use((error: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // Body parser rejects malformed JSON with a 400 status
    const status: unknown = Reflect.get(error, 'status');
    if (status === 400) {
      res.status(400).json({
        success: false,
        error: { type: 'VALIDATION_ERROR', message: 'Malformed JSON body', details: {} },
      });
      return;
    }

    logger.error('Unhandled error', { error: error.message, stack: error.stack });
    res.status(500).json({
      success: false,
      error: {
        type: 'INTERNAL_ERROR',
        message: context.environment === 'development' ? error.message : 'Something went wrong',
        details: {},
      },
    });
  });

  // 404 handler
  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({
      success: false,
      error: { type: 'NOT_FOUND', message: 'Not found', details: { path: req.path } },
    });
  });

  return app;
}
