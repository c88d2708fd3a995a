/**
 * =============================================================================
 * AUTH MODULE - ROUTES
 * =============================================================================
 *
 * Endpoints:
 * POST /auth/token - Username/password login, returns a bearer token
 * =============================================================================
 */

import { Router } from 'express';
import { authController } from './auth.controller';
import { authRateLimiter } from '../../shared/middleware/rate-limiter.middleware';

const router = Router();

/**
 * @route   POST /auth/token
 * @desc    OAuth2 password grant (form or JSON body)
 * @access  Public (rate limited)
 */
router.post('/token', authRateLimiter, authController.issueToken);

export { router as authRouter };
