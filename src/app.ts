/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Builds the app without listening, so tests can drive it with supertest.
 *
 * Middleware order:
 *   request id -> compression -> security headers -> CORS -> body parsers
 *   -> suspicious-request filter -> request logging -> rate limiting
 *   -> routes -> 404 -> error handler
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { config } from './config/environment';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import {
  requestIdMiddleware,
  securityHeaders,
  blockSuspiciousRequests
} from './shared/middleware/security.middleware';
import { healthRoutes } from './shared/routes/health.routes';
import { authRouter } from './modules/auth/auth.routes';
import { analyticsRouter } from './modules/analytics/analytics.routes';
import { documentsRouter } from './modules/documents/documents.routes';

export function createApp(): Express {
  const app = express();

  // req.ip must be the client, not the load balancer, for rate limiting
  app.set('trust proxy', 1);
  app.disable('x-powered-by');

  app.use(requestIdMiddleware);
  app.use(compression());
  app.use(securityHeaders);
  app.use(cors({
    origin: config.cors.origin,
    methods: ['GET', 'PUT', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID']
  }));

  app.use(express.json({ limit: '100kb' }));
  // OAuth2 password grant bodies are form-encoded
  app.use(express.urlencoded({ extended: false, limit: '10kb' }));

  app.use(blockSuspiciousRequests);

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  app.use(rateLimiter);

  // Routes
  app.use('/', healthRoutes);
  app.use('/auth', authRouter);
  app.use('/analytics', analyticsRouter);
  app.use('/documents', documentsRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
