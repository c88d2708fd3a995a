/**
 * =============================================================================
 * ANALYTICS MODULE - ROUTES
 * =============================================================================
 *
 * Endpoints:
 * GET /analytics/employees/growth       - Monthly registrations + projection
 * GET /analytics/truckers/distribution  - Province / company breakdown + trend
 * GET /analytics/business/impact        - Churn and compliance rates
 * GET /analytics/compliance             - Raw counts
 * =============================================================================
 */

import { Router } from 'express';
import { analyticsController } from './analytics.controller';
import { requireAuth } from '../../shared/middleware/auth.middleware';

const router = Router();

router.use(requireAuth);

/**
 * @route   GET /analytics/employees/growth
 * @access  Private (when AUTH_REQUIRED)
 */
router.get('/employees/growth', analyticsController.getEmployeeGrowth);

/**
 * @route   GET /analytics/truckers/distribution
 * @access  Private (when AUTH_REQUIRED)
 */
router.get('/truckers/distribution', analyticsController.getTruckerDistribution);

/**
 * @route   GET /analytics/business/impact
 * @access  Private (when AUTH_REQUIRED)
 */
router.get('/business/impact', analyticsController.getBusinessImpact);

/**
 * @route   GET /analytics/compliance
 * @access  Private (when AUTH_REQUIRED)
 */
router.get('/compliance', analyticsController.getCompliance);

export { router as analyticsRouter };
