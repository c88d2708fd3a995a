/**
 * =============================================================================
 * DOCUMENTS MODULE - VALIDATION SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';

/**
 * PUT /documents/:id body
 */
export const updateVerificationSchema = z.object({
  verified: z.boolean({
    required_error: 'verified is required',
    invalid_type_error: 'verified must be a boolean'
  }),
  verified_by: z.string().max(255).nullable().optional()
});

export type UpdateVerificationInput = z.infer<typeof updateVerificationSchema>;
