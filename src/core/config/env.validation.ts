/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates all environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * validateAndLogEnvironment(); // Throws if invalid
 * ```
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => !isNaN(parseInt(v, 10)) && parseInt(v, 10) > 0;
const isBooleanString = (v: string): boolean => ['true', 'false'].includes(v.toLowerCase());

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '3000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },
  {
    name: 'HOST',
    required: false,
    default: '0.0.0.0',
    description: 'Server host address'
  },

  // ==========================================================================
  // JWT AUTHENTICATION
  // ==========================================================================
  {
    name: 'JWT_SECRET',
    required: false, // Enforced by config/environment.ts in production
    validator: (v) => v.length >= 16,
    description: 'JWT signing secret (min 16 characters, 32+ in production)'
  },
  {
    name: 'JWT_ACCESS_TOKEN_EXPIRE_MINUTES',
    required: false,
    default: '30',
    validator: isPositiveInt,
    description: 'Lifetime of tokens issued by POST /auth/token, in minutes'
  },
  {
    name: 'AUTH_REQUIRED',
    required: false,
    default: 'true',
    validator: isBooleanString,
    description: 'Require bearer tokens on analytics and document routes'
  },
  {
    name: 'BCRYPT_ROUNDS',
    required: false,
    default: '10',
    validator: isPositiveInt,
    description: 'bcrypt cost factor for new passwords'
  },

  // ==========================================================================
  // DATABASE
  // ==========================================================================
  {
    name: 'DATABASE_URL',
    required: false, // Only required in production
    description: 'PostgreSQL connection string'
  },
  {
    name: 'DB_POOL_MAX',
    required: false,
    default: '10',
    validator: isPositiveInt,
    description: 'Maximum database pool connections'
  },
  {
    name: 'DB_SSL',
    required: false,
    default: 'false',
    validator: isBooleanString,
    description: 'Use TLS for the database connection'
  },
  {
    name: 'DB_AUTO_MIGRATE',
    required: false,
    default: 'true',
    validator: isBooleanString,
    description: 'Create missing tables at startup'
  },

  // ==========================================================================
  // RATE LIMITING
  // ==========================================================================
  {
    name: 'RATE_LIMIT_WINDOW_MS',
    required: false,
    default: '900000',
    validator: isPositiveInt,
    description: 'Rate limit window in milliseconds'
  },
  {
    name: 'RATE_LIMIT_MAX_REQUESTS',
    required: false,
    default: '300',
    validator: isPositiveInt,
    description: 'Maximum requests per window'
  },
  {
    name: 'AUTH_RATE_LIMIT_MAX',
    required: false,
    default: '30',
    validator: isPositiveInt,
    description: 'Maximum login attempts per window'
  },

  // ==========================================================================
  // CORS & LOGGING
  // ==========================================================================
  {
    name: 'CORS_ORIGIN',
    required: false,
    default: '*',
    description: 'Allowed CORS origins (comma-separated)'
  },
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'info',
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Logging level'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    if (isProduction) {
      if (envVar.name === 'DATABASE_URL' && !value) {
        result.valid = false;
        result.errors.push('DATABASE_URL is required in production');
      }

      if (envVar.name === 'JWT_SECRET' && !value) {
        result.valid = false;
        result.errors.push('JWT_SECRET is required in production');
      }

      if (envVar.name === 'AUTH_REQUIRED' && value === 'false') {
        result.warnings.push('AUTH_REQUIRED is false in production - analytics are publicly readable');
      }
    }

    const finalValue = value || envVar.default;
    if (finalValue) {
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name} - ${envVar.description}`);
        continue;
      }

      // Secrets never reach the summary
      result.loaded[envVar.name] = envVar.name === 'JWT_SECRET' || envVar.name === 'DATABASE_URL'
        ? '[set]'
        : finalValue;
    }
  }

  return result;
}

/**
 * Validate, log the outcome and throw if invalid
 */
export function validateAndLogEnvironment(): void {
  const result = validateEnvironment();

  for (const warning of result.warnings) {
    logger.warn(`[ENV] ${warning}`);
  }

  if (!result.valid) {
    for (const error of result.errors) {
      logger.error(`[ENV] ${error}`);
    }
    throw new Error(`Environment validation failed with ${result.errors.length} error(s)`);
  }

  logger.info('[ENV] Environment validated', { loaded: result.loaded });
}
