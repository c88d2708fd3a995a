/**
 * =============================================================================
 * DOCUMENTS MODULE - SERVICE
 * =============================================================================
 *
 * Verification flag updates. The first verifier and the first verification
 * time are kept when a verified document is verified again; un-verifying
 * clears both.
 * =============================================================================
 */

import { createUnitOfWork, UnitOfWork } from '../../shared/database/db';
import { logger } from '../../shared/services/logger.service';
import { DocumentNotFoundError } from '../../core';
import { DocumentRepository, PgDocumentRepository } from './documents.repository';
import { VerificationRequest, VerificationState } from './documents.types';

/**
 * Next verification state for a document
 */
export function applyVerification(
  current: VerificationState,
  request: VerificationRequest,
  now: Date
): VerificationState {
  if (!request.verified) {
    return { verified: false, verification_date: null, verified_by: null };
  }

  if (current.verification_date) {
    return { verified: true, verification_date: current.verification_date, verified_by: current.verified_by };
  }

  return { verified: true, verification_date: now, verified_by: request.verifiedBy ?? null };
}

export class DocumentService {
  constructor(
    private readonly unitOfWork: UnitOfWork<DocumentRepository>,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Set or clear the verified flag of one document.
   * The row is locked for the whole read-modify-write.
   */
  async setVerification(documentId: number, request: VerificationRequest): Promise<VerificationState> {
    const next = await this.unitOfWork(async (repository) => {
      const document = await repository.findByIdForUpdate(documentId);
      if (!document) {
        throw new DocumentNotFoundError(documentId);
      }

      const state = applyVerification(document, request, this.clock());
      await repository.updateVerification(documentId, state);
      return state;
    });

    logger.info('[DOCUMENTS] Verification updated', {
      documentId,
      verified: next.verified,
      verifiedBy: next.verified_by
    });

    return next;
  }
}

export const documentService = new DocumentService(
  createUnitOfWork((client) => new PgDocumentRepository(client))
);
