/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Centralized logging service using Winston.
 *
 * SECURITY:
 * - Never logs sensitive data (tokens, passwords, secrets)
 * - Different log levels for different environments
 * =============================================================================
 */

import winston from 'winston';
import { config } from '../../config/environment';

// Sensitive fields to never log
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'secret',
  'authorization',
  'hashed'
];

/**
 * Remove sensitive fields from log data
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const isSensitive = SENSITIVE_FIELDS.some(field =>
      key.toLowerCase().includes(field)
    );

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    let log = `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}`;

    const sanitizedMeta = sanitizeLogData(meta);
    if (Object.keys(sanitizedMeta).length > 0) {
      log += ` ${JSON.stringify(sanitizedMeta)}`;
    }

    if (stack) {
      log += `\n${String(stack)}`;
    }

    return log;
  })
);

// Create logger instance
export const logger = winston.createLogger({
  level: config.logLevel,
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      )
    }),

    // File transports (production)
    ...(config.isProduction ? [
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5
      }),
      new winston.transports.File({
        filename: 'logs/combined.log',
        maxsize: 5242880,
        maxFiles: 5
      })
    ] : [])
  ]
});
