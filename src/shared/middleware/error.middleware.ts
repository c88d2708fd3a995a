/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { DatabaseError } from 'pg';
import { logger } from '../services/logger.service';
import { AppError, ErrorCode, HTTP_STATUS, InternalError, getErrorCategory } from '../../core';
import { config } from '../../config/environment';

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const logData = {
    error: error.message,
    path: req.path,
    method: req.method,
    requestId: req.headers['x-request-id']
  };

  // Known operational error
  if (error instanceof AppError) {
    if (error.isOperational && error.statusCode < HTTP_STATUS.INTERNAL_ERROR) {
      logger.warn('Request rejected', { ...logData, code: error.code, category: getErrorCategory(error.code) });
    } else {
      logger.error('Request error', { ...logData, code: error.code, stack: error.stack });
    }

    if (error.statusCode === HTTP_STATUS.UNAUTHORIZED) {
      res.set('WWW-Authenticate', 'Bearer');
    }
    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  // body-parser errors (bad JSON, too large, unsupported charset) carry their own 4xx status
  const payloadStatus = clientPayloadStatus(error);
  if (payloadStatus !== null) {
    logger.warn('Rejected request body', { ...logData, status: payloadStatus });
    res.status(payloadStatus).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: error instanceof SyntaxError ? 'Malformed request body' : error.message
      }
    });
    return;
  }

  // Storage failures keep their SQLSTATE in the log, never in the response
  if (error instanceof DatabaseError) {
    logger.error('Database error', { ...logData, sqlState: error.code, stack: error.stack });
    const rendered = new InternalError(
      config.isProduction ? 'An unexpected error occurred. Please try again later.' : 'Database error',
      ErrorCode.DATABASE_ERROR
    );
    res.status(rendered.statusCode).json(rendered.toJSON());
    return;
  }

  logger.error('Unhandled request error', { ...logData, stack: error.stack });

  // SECURITY: Never expose internal error details to client in production
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : error.message
    }
  });
}

/**
 * Status of an http-errors style client error marked safe to expose, else null
 */
function clientPayloadStatus(error: Error): number | null {
  if (!('status' in error) || typeof error.status !== 'number') return null;
  if (!('expose' in error) || error.expose !== true) return null;
  return error.status >= HTTP_STATUS.BAD_REQUEST && error.status < HTTP_STATUS.INTERNAL_ERROR ? error.status : null;
}

/**
 * Async route wrapper to catch async errors
 * Use this to wrap async route handlers
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json({
    success: false,
    error: {
      code: ErrorCode.ROUTE_NOT_FOUND,
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}
