/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * SECURITY FEATURES:
 * - Helmet security headers (JSON API profile)
 * - Request ID tracking
 * - Suspicious URL blocking
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../services/logger.service';
import { ErrorCode, HTTP_STATUS } from '../../core';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9-]{1,64}$/;

/**
 * Generate and attach request ID for tracking.
 * A client supplied X-Request-ID is reused when it is well formed.
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const incoming = req.get('x-request-id')?.trim();
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : uuidv4();

  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Security headers using Helmet.
 * The API serves JSON only, so everything but JSON is locked down.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-site' },
  frameguard: { action: 'deny' },
  hidePoweredBy: true,
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
});

/**
 * Block suspicious requests (path traversal, script injection in the URL)
 */
export function blockSuspiciousRequests(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const suspiciousPatterns = [
    /\.\.\//,           // Path traversal
    /<script/i,         // XSS attempt
    /union.*select/i,   // SQL injection
  ];

  // URL only - bodies are validated by zod schemas
  const requestString = decodeSafely(req.originalUrl);

  for (const pattern of suspiciousPatterns) {
    if (pattern.test(requestString)) {
      logger.warn('Blocked suspicious request', {
        ip: req.ip,
        url: req.originalUrl,
        pattern: pattern.toString(),
      });

      res.status(HTTP_STATUS.BAD_REQUEST).json({
        success: false,
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Invalid request',
        },
      });
      return;
    }
  }

  next();
}

function decodeSafely(url: string): string {
  try {
    return decodeURIComponent(url);
  } catch {
    return url;
  }
}
