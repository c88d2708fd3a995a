/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new DocumentNotFoundError(documentId);
 *
 * // In controller
 * throw ValidationError.fromZodError(result.error);
 * ```
 *
 * The global error middleware turns any AppError into
 * `{ success: false, error: { code, message, details } }` with its status.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details })
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { fields: errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Invalid request data', errors);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 401 Unauthorized - Authentication required or failed
 */
export class UnauthorizedError extends AppError {
  constructor(
    message: string = 'Unauthorized',
    code: ErrorCode | string = ErrorCode.AUTH_TOKEN_INVALID
  ) {
    super(message, HTTP_STATUS.UNAUTHORIZED, code, true);
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = ErrorCode.ROUTE_NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

/**
 * 409 Conflict - Resource already exists
 */
export class ConflictError extends AppError {
  constructor(
    message: string = 'Resource conflict',
    code: ErrorCode | string = 'CONFLICT',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.CONFLICT, code, true, details);
  }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(
    message: string = 'Internal server error',
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, code, false, details);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

/**
 * Authentication-specific errors
 */
export class AuthenticationError extends UnauthorizedError {
  constructor(
    message: string = 'Incorrect username or password',
    code: ErrorCode = ErrorCode.AUTH_INVALID_CREDENTIALS
  ) {
    super(message, code);
  }
}

export class TokenExpiredError extends UnauthorizedError {
  constructor() {
    super('Token has expired', ErrorCode.AUTH_TOKEN_EXPIRED);
  }
}

export class UserExistsError extends ConflictError {
  constructor(username: string) {
    super(`User already exists: ${username}`, ErrorCode.AUTH_USER_EXISTS, { username });
  }
}

/**
 * Document-specific errors
 */
export class DocumentNotFoundError extends NotFoundError {
  constructor(documentId: number) {
    super('Document not found', ErrorCode.DOCUMENT_NOT_FOUND, { documentId });
  }
}
