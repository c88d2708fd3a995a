/**
 * =============================================================================
 * AUTH MIDDLEWARE
 * =============================================================================
 *
 * Bearer-token authentication for protected routes.
 *
 * SECURITY:
 * - Token signature and expiry checked on every request
 * - AUTH_REQUIRED=false turns protected routes into optional-auth routes
 *   (development only, logged at startup)
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { config } from '../../config/environment';
import { ErrorCode, UnauthorizedError } from '../../core';
import { authService, AuthenticatedUser } from '../../modules/auth/auth.service';

/**
 * Extended Request type with user info
 */
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

function readBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader) {
    return null;
  }

  const [scheme, token] = authHeader.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) {
    return null;
  }
  return token;
}

/**
 * Auth middleware - rejects requests without a valid bearer token
 */
export function authenticate(req: Request, _res: Response, next: NextFunction): void {
  try {
    const token = readBearerToken(req);
    if (!token) {
      throw new UnauthorizedError('Authentication required', ErrorCode.AUTH_TOKEN_MISSING);
    }

    req.user = authService.verifyToken(token);
    next();
  } catch (error) {
    next(error);
  }
}

/**
 * Optional auth middleware - attaches the user when a valid token is present
 */
export function optionalAuthenticate(req: Request, _res: Response, next: NextFunction): void {
  const token = readBearerToken(req);
  if (!token) {
    next();
    return;
  }

  try {
    req.user = authService.verifyToken(token);
  } catch {
    // Invalid token - continue without user
    req.user = undefined;
  }
  next();
}

/**
 * Guard for the analytics and documents routes, chosen once from AUTH_REQUIRED
 */
export const requireAuth: RequestHandler = config.auth.required ? authenticate : optionalAuthenticate;
