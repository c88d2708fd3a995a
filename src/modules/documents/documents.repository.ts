/**
 * =============================================================================
 * DOCUMENTS MODULE - REPOSITORY
 * =============================================================================
 *
 * Must run inside a transaction: findByIdForUpdate takes a row lock that
 * is held until COMMIT / ROLLBACK.
 * =============================================================================
 */

import { Queryable } from '../../shared/database/db';
import { DocumentRecord, VerificationState } from './documents.types';

export interface DocumentRepository {
  findByIdForUpdate(documentId: number): Promise<DocumentRecord | null>;
  updateVerification(documentId: number, state: VerificationState): Promise<void>;
}

export class PgDocumentRepository implements DocumentRepository {
  constructor(private readonly client: Queryable) {}

  async findByIdForUpdate(documentId: number): Promise<DocumentRecord | null> {
    const { rows } = await this.client.query<DocumentRecord>(
      `SELECT id, title, verified, verification_date, verified_by
         FROM documents
        WHERE id = $1
          FOR UPDATE`,
      [documentId]
    );
    return rows[0] ?? null;
  }

  async updateVerification(documentId: number, state: VerificationState): Promise<void> {
    await this.client.query(
      `UPDATE documents
          SET verified = $2, verification_date = $3, verified_by = $4
        WHERE id = $1`,
      [documentId, state.verified, state.verification_date, state.verified_by]
    );
  }
}
