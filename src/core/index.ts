/**
 * =============================================================================
 * CORE MODULE - Central Exports
 * =============================================================================
 *
 * Single entry point for all core functionality.
 *
 * USAGE:
 * ```typescript
 * import { ErrorCode, AppError, DocumentNotFoundError } from '../../core';
 * ```
 * =============================================================================
 */

// Constants & Enums
export * from './constants';

// Error Classes
export * from './errors/AppError';

// Environment Validation
export * from './config/env.validation';
