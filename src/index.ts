import { Server } from 'http';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { closeDatabaseConnection } from '@/db/connection.js';
import { createApp } from './app.js';
import { createAppContext } from './app-context.js';

const env = getEnvironment();

function startServer(): Server {
  const app = createApp(createAppContext());

  const server = app.listen(env.PORT, () => {
    logger.info('Content Workflow Service started', {
      environment: env.NODE_ENV,
      port: env.PORT,
    });
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    logger.error('Server failed to start', { code: err.code, error: err.message });
    process.exit(1);
  });

  return server;
}

function setupGracefulShutdown(server: Server): void {
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close(() => {
      closeDatabaseConnection()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close database connection', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

setupGracefulShutdown(startServer());
