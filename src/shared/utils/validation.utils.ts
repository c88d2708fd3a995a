/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../../core';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Surrogate integer primary key taken from a route param.
 * Decimal digits only: hex, exponent, sign and whitespace forms are rejected
 * before the string is coerced.
 */
export const idParamSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/, 'id must be an integer')
    .pipe(
      z.coerce
        .number()
        .int('id must be an integer')
        .positive('id must be positive')
        .max(2147483647, 'id is out of range')
    )
});

// ============================================================
// VALIDATION
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on failure
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns Validated and transformed data
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}
