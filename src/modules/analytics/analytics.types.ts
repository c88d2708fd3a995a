/**
 * =============================================================================
 * ANALYTICS MODULE - TYPES
 * =============================================================================
 *
 * Row shapes returned by the repository and the response contracts of the
 * four analytics endpoints. Response keys are snake_case on the wire.
 * =============================================================================
 */

import { DistributionTrend } from '../../core';

// =============================================================================
// REPOSITORY ROWS
// =============================================================================

/**
 * Active employee registrations in one calendar month ("YYYY-MM")
 */
export interface MonthlyCount {
  month: string;
  count: number;
}

/**
 * Count for one grouping key (province or company)
 */
export interface BucketCount {
  key: string;
  count: number;
}

/**
 * Total and archived rows of an archivable table
 */
export interface PopulationCounts {
  total: number;
  archived: number;
}

export interface DocumentCounts {
  total: number;
  verified: number;
}

// =============================================================================
// RESPONSES
// =============================================================================

export interface EmployeeGrowthSummary {
  monthly_registrations: Record<string, number>;
  average_growth: number;
  projection: number;
}

export interface TruckerDistributionSummary {
  by_province: Record<string, number>;
  by_company: Record<string, number>;
  percentages: Record<string, number>;
  /** null when there are no truckers */
  most_common: string | null;
  trend: DistributionTrend;
}

export interface BusinessImpactSummary {
  employee_churn_rate: number;
  trucker_churn_rate: number;
  document_compliance_rate: number;
}

export interface ComplianceSnapshot {
  total_employees: number;
  active_employees: number;
  total_truckers: number;
  active_truckers: number;
  total_documents: number;
  verified_documents: number;
  unverified_documents: number;
}
