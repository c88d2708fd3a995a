/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates per client IP.
 *
 * - rateLimiter:     every route
 * - authRateLimiter: POST /auth/token (brute-force protection)
 *
 * Counters live in the process (express-rate-limit memory store).
 * Both limiters are no-ops when ENABLE_RATE_LIMITING=false.
 * =============================================================================
 */

import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { config } from '../../config/environment';
import { logger } from '../services/logger.service';
import { ErrorCode } from '../../core';

const passThrough: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

function buildLimiter(max: number, message: string): RequestHandler {
  if (!config.security.enableRateLimiting) {
    return passThrough;
  }

  return rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res, _next, options) => {
      logger.warn('Rate limit exceeded', { ip: req.ip, path: req.path });
      res.status(options.statusCode).json({
        success: false,
        error: {
          code: ErrorCode.RATE_LIMIT_EXCEEDED,
          message
        }
      });
    }
  });
}

/**
 * Global limiter
 */
export const rateLimiter = buildLimiter(
  config.rateLimit.maxRequests,
  'Too many requests. Please try again later.'
);

/**
 * Login limiter
 */
export const authRateLimiter = buildLimiter(
  config.rateLimit.authMaxRequests,
  'Too many login attempts. Please try again later.'
);
