/**
 * =============================================================================
 * FLEET ANALYTICS BACKEND - SERVER ENTRY POINT
 * =============================================================================
 *
 * Startup:
 *   1. Validate environment (fails fast on bad config)
 *   2. Create missing tables when DB_AUTO_MIGRATE=true
 *   3. Listen on HOST:PORT
 *
 * Shutdown (SIGTERM / SIGINT):
 *   stop accepting connections -> drain the pg pool -> exit
 * =============================================================================
 */

import { validateAndLogEnvironment } from './core/config/env.validation';
import { config } from './config/environment';
import { logger } from './shared/services/logger.service';
import { closePool, ensureSchema } from './shared/database/db';
import { createApp } from './app';

const SHUTDOWN_TIMEOUT_MS = 30000;

async function bootstrap(): Promise<void> {
  validateAndLogEnvironment();

  if (config.database.autoMigrate) {
    await ensureSchema();
  }

  if (!config.auth.required) {
    logger.warn('⚠️  AUTH_REQUIRED=false - analytics and document routes accept anonymous requests');
  }

  const app = createApp();

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Server started on ${config.host}:${config.port}`, {
      environment: config.nodeEnv,
      authRequired: config.auth.required
    });
  });

  server.timeout = 30000;
  server.keepAliveTimeout = 65000;
  server.headersTimeout = 66000;

  let shuttingDown = false;

  const gracefulShutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received. Starting graceful shutdown...`);

    // Force shutdown if connections refuse to drain
    const forceExit = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    server.close(() => {
      logger.info('HTTP server closed');

      closePool()
        .then(() => {
          logger.info('Graceful shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error closing database pool', {
            error: error instanceof Error ? error.message : String(error)
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', {
    error: reason instanceof Error ? reason.message : String(reason)
  });
  process.exit(1);
});

bootstrap().catch((error: unknown) => {
  logger.error('Server failed to start', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
