/**
 * =============================================================================
 * AUTH MODULE - CONTROLLER
 * =============================================================================
 *
 * Handles HTTP requests for authentication.
 * Controller only handles request/response - business logic is in service.
 * =============================================================================
 */

import { Request, Response } from 'express';
import { authService } from './auth.service';
import { tokenRequestSchema } from './auth.schema';
import { validateSchema } from '../../shared/utils/validation.utils';
import { asyncHandler } from '../../shared/middleware/error.middleware';

class AuthController {
  /**
   * Exchange username/password for an access token
   */
  issueToken = asyncHandler(async (req: Request, res: Response) => {
    const data = validateSchema(tokenRequestSchema, req.body);

    const token = await authService.login(data.username, data.password);

    res.set('Cache-Control', 'no-store');
    res.status(200).json(token);
  });
}

export const authController = new AuthController();
