/**
 * =============================================================================
 * AUTH MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * Zod schemas for validating auth requests.
 * POST /auth/token takes an OAuth2 password-grant form
 * (application/x-www-form-urlencoded); JSON bodies with the same
 * fields are accepted too.
 * =============================================================================
 */

import { z } from 'zod';

/**
 * Token request (OAuth2 password grant form)
 */
export const tokenRequestSchema = z.object({
  grant_type: z.string().regex(/^password$/, 'grant_type must be "password"').optional(),
  username: z.string().trim().min(1, 'username is required').max(150),
  password: z.string().min(1, 'password is required').max(256),
  scope: z.string().optional()
});

/**
 * Account provisioning (create-user command)
 */
export const createUserSchema = z.object({
  username: z.string().trim()
    .min(3, 'username must be at least 3 characters')
    .max(150)
    .regex(/^[A-Za-z0-9_.@-]+$/, 'username may only contain letters, digits and _ . @ -'),
  password: z.string()
    .min(8, 'password must be at least 8 characters')
    .max(72, 'password must be at most 72 characters') // bcrypt truncates beyond 72 bytes
});

export type TokenRequestInput = z.infer<typeof tokenRequestSchema>;
export type CreateUserInput = z.infer<typeof createUserSchema>;
