/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires JWT_SECRET (validated at startup)
 * - Development and test use an auto-generated secret if not provided
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getRequired() for mandatory production values
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (process.env.NODE_ENV !== 'production') {
    const generated = randomBytes(32).toString('hex');
    console.warn(`⚠️  [CONFIG] ${key} not set, auto-generated for development`);
    return generated;
  }

  throw new Error(
    `❌ FATAL: ${key} is required in production!\n` +
    `   Generate a secure value with: node -e "console.log(require('crypto').randomBytes(64).toString('hex'))"\n` +
    `   Then set it in your environment variables or .env file.`
  );
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Database
  database: {
    url: getOptional('DATABASE_URL', 'postgresql://localhost:5432/fleet_analytics'),
    poolMax: getNumber('DB_POOL_MAX', 10),
    ssl: getBoolean('DB_SSL', false),
    autoMigrate: getBoolean('DB_AUTO_MIGRATE', true),
  },

  // JWT - SECURITY CRITICAL
  // Auto-generated outside production, REQUIRED in production
  jwt: {
    secret: getRequired('JWT_SECRET'),
    accessTokenExpireMinutes: getNumber('JWT_ACCESS_TOKEN_EXPIRE_MINUTES', 30),
  },

  // Auth
  auth: {
    // Bearer tokens on /analytics and /documents
    required: getBoolean('AUTH_REQUIRED', true),
    bcryptRounds: getNumber('BCRYPT_ROUNDS', 10),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 300),
    authMaxRequests: getNumber('AUTH_RATE_LIMIT_MAX', 30),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // CORS
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',

  // Security Features
  security: {
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.auth.required) {
      warnings.push('AUTH_REQUIRED is false - analytics and document routes are open');
    }

    if (config.jwt.secret.length < 32) {
      errors.push('JWT_SECRET must be at least 32 characters in production');
    }
  }

  if (config.jwt.accessTokenExpireMinutes <= 0) {
    errors.push('JWT_ACCESS_TOKEN_EXPIRE_MINUTES must be a positive number of minutes');
  }

  if (config.auth.bcryptRounds < 4 || config.auth.bcryptRounds > 15) {
    errors.push('BCRYPT_ROUNDS must be between 4 and 15');
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

validateConfig();
