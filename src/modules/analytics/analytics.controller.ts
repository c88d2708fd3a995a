/**
 * =============================================================================
 * ANALYTICS MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { analyticsService } from './analytics.service';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class AnalyticsController {
  getEmployeeGrowth = asyncHandler(async (_req: Request, res: Response) => {
    res.json(await analyticsService.getEmployeeGrowth());
  });

  getTruckerDistribution = asyncHandler(async (_req: Request, res: Response) => {
    res.json(await analyticsService.getTruckerDistribution());
  });

  getBusinessImpact = asyncHandler(async (_req: Request, res: Response) => {
    res.json(await analyticsService.getBusinessImpact());
  });

  getCompliance = asyncHandler(async (_req: Request, res: Response) => {
    res.json(await analyticsService.getComplianceSnapshot());
  });
}

export const analyticsController = new AnalyticsController();
