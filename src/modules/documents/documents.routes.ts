/**
 * =============================================================================
 * DOCUMENTS MODULE - ROUTES
 * =============================================================================
 *
 * Endpoints:
 * PUT /documents/:id - Set or clear the verified flag
 * =============================================================================
 */

import { Router } from 'express';
import { documentsController } from './documents.controller';
import { requireAuth } from '../../shared/middleware/auth.middleware';

const router = Router();

/**
 * @route   PUT /documents/:id
 * @desc    Body: { verified: boolean, verified_by?: string | null }
 * @access  Private (when AUTH_REQUIRED)
 */
router.put('/:id', requireAuth, documentsController.updateVerification);

export { router as documentsRouter };
