/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Easy to find and modify values
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// ANALYTICS
// =============================================================================

/**
 * Company bucket for truckers without a company_name
 */
export const INDEPENDENT_COMPANY = 'Independent';

/**
 * Trucker distribution trend labels
 */
export enum DistributionTrend {
  INCREASING_INDEPENDENCE = 'Increasing independence',
  COMPANY_DOMINANCE = 'Company dominance',
  BALANCED = 'Balanced'
}

/**
 * Percentage thresholds used by the trend classification.
 * Both comparisons are strict (>).
 */
export const TREND_THRESHOLDS = {
  INDEPENDENCE_PERCENT: 40,
  DOMINANCE_PERCENT: 60
} as const;

/**
 * Month bucket format for employee registrations (Postgres to_char pattern)
 */
export const MONTH_KEY_FORMAT = 'YYYY-MM';

// =============================================================================
// AUTH
// =============================================================================

/**
 * Lifetime of an access token when the caller does not pass one
 */
export const DEFAULT_TOKEN_TTL_MINUTES = 15;

export const TOKEN_TYPE = 'bearer';

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES (Hierarchical Structure)
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 1xxx: Authentication & Authorization
 * - 2xxx: Validation errors
 * - 3xxx: Document errors
 * - 9xxx: System/Infrastructure errors
 */
export enum ErrorCode {
  // AUTHENTICATION & AUTHORIZATION (1xxx)
  AUTH_INVALID_CREDENTIALS = 'AUTH_1001',
  AUTH_TOKEN_EXPIRED = 'AUTH_1002',
  AUTH_TOKEN_INVALID = 'AUTH_1003',
  AUTH_TOKEN_MISSING = 'AUTH_1004',
  AUTH_USER_EXISTS = 'AUTH_1005',

  // VALIDATION ERRORS (2xxx)
  VALIDATION_ERROR = 'VAL_2001',

  // DOCUMENTS (3xxx)
  DOCUMENT_NOT_FOUND = 'DOC_3001',

  // SYSTEM & INFRASTRUCTURE (9xxx)
  INTERNAL_ERROR = 'SYS_9001',
  RATE_LIMIT_EXCEEDED = 'SYS_9003',
  DATABASE_ERROR = 'SYS_9004',
  ROUTE_NOT_FOUND = 'SYS_9005'
}

/**
 * Error category for grouping in logs
 */
export enum ErrorCategory {
  AUTH = 'authentication',
  VALIDATION = 'validation',
  RESOURCE = 'resource',
  SYSTEM = 'system'
}

export const ERROR_CATEGORY_MAP: Record<string, ErrorCategory> = {
  'AUTH_': ErrorCategory.AUTH,
  'VAL_': ErrorCategory.VALIDATION,
  'DOC_': ErrorCategory.RESOURCE,
  'SYS_': ErrorCategory.SYSTEM
};

/**
 * Get error category from error code (prefix lookup)
 */
export function getErrorCategory(errorCode: ErrorCode | string): ErrorCategory {
  const prefix = errorCode.split('_')[0] + '_';
  return ERROR_CATEGORY_MAP[prefix] || ErrorCategory.SYSTEM;
}
