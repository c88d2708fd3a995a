/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /              - Service banner
 * - GET /health        - Quick health check (for load balancers)
 * - GET /health/live   - Liveness probe (is the process running?)
 * - GET /health/ready  - Readiness probe (can it reach PostgreSQL?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { pingDatabase } from '../database/db';
import { asyncHandler } from '../middleware/error.middleware';
import { HTTP_STATUS } from '../../core';

const router = Router();

// Track server start time
const startTime = Date.now();

export const SERVICE_BANNER = 'IoT Analytics Backend Running!';

router.get('/', (_req: Request, res: Response) => {
  res.json({ message: SERVICE_BANNER });
});

/**
 * Basic health check - for load balancers
 */
router.get('/health', (_req: Request, res: Response) => {
  res.status(HTTP_STATUS.OK).json({
    status: 'healthy',
    timestamp: new Date().toISOString()
  });
});

/**
 * Liveness probe - is the process alive?
 */
router.get('/health/live', (_req: Request, res: Response) => {
  res.status(HTTP_STATUS.OK).json({
    status: 'alive',
    pid: process.pid,
    uptime: Math.floor((Date.now() - startTime) / 1000)
  });
});

/**
 * Readiness probe - 503 until the database answers
 */
router.get('/health/ready', asyncHandler(async (_req: Request, res: Response) => {
  const database = await pingDatabase();

  res.status(database ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json({
    status: database ? 'ready' : 'not_ready',
    checks: { database },
    timestamp: new Date().toISOString()
  });
}));

export { router as healthRoutes };
