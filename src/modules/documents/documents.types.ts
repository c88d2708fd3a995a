/**
 * =============================================================================
 * DOCUMENTS MODULE - TYPES
 * =============================================================================
 */

/**
 * Verification columns of a document row.
 * verification_date and verified_by are only set while verified is true.
 */
export interface VerificationState {
  verified: boolean;
  verification_date: Date | null;
  verified_by: string | null;
}

export interface DocumentRecord extends VerificationState {
  id: number;
  title: string;
}

export interface VerificationRequest {
  verified: boolean;
  verifiedBy?: string | null;
}
