/**
 * =============================================================================
 * DOCUMENTS MODULE - CONTROLLER
 * =============================================================================
 */

import { Request, Response } from 'express';
import { documentService } from './documents.service';
import { updateVerificationSchema } from './documents.schema';
import { idParamSchema, validateSchema } from '../../shared/utils/validation.utils';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { HTTP_STATUS } from '../../core';

class DocumentsController {
  /**
   * Set or clear a document's verification
   */
  updateVerification = asyncHandler(async (req: Request, res: Response) => {
    const { id } = validateSchema(idParamSchema, req.params);
    const body = validateSchema(updateVerificationSchema, req.body);

    await documentService.setVerification(id, {
      verified: body.verified,
      verifiedBy: body.verified_by
    });

    res.status(HTTP_STATUS.NO_CONTENT).end();
  });
}

export const documentsController = new DocumentsController();
