/**
 * =============================================================================
 * ANALYTICS MODULE - CALCULATIONS
 * =============================================================================
 *
 * Pure functions turning grouped counts into summaries.
 * No I/O here: the service feeds these with rows read in one snapshot.
 *
 * Every ratio guards its denominator; an empty population yields 0,
 * never NaN or Infinity.
 * =============================================================================
 */

import {
  DistributionTrend,
  INDEPENDENT_COMPANY,
  TREND_THRESHOLDS
} from '../../core';
import {
  BucketCount,
  BusinessImpactSummary,
  ComplianceSnapshot,
  DocumentCounts,
  EmployeeGrowthSummary,
  MonthlyCount,
  PopulationCounts,
  TruckerDistributionSummary
} from './analytics.types';

// =============================================================================
// NUMERIC HELPERS
// =============================================================================

// Veltkamp splitter, 2^27 + 1
const SPLITTER = 134217729;

function splitDouble(a: number): [number, number] {
  const c = SPLITTER * a;
  const high = c - (c - a);
  return [high, a - high];
}

/**
 * Rounding error of the product a·b, so that a·b = product + error exactly
 */
function productError(a: number, b: number, product: number): number {
  const [aHigh, aLow] = splitDouble(a);
  const [bHigh, bLow] = splitDouble(b);
  return aLow * bLow - (((product - aHigh * bHigh) - aLow * bHigh) - aHigh * bLow);
}

/**
 * Round to `decimals` places, exact halves to the even neighbour.
 * Ties are judged on the exact binary value, so 2.675 (stored just below)
 * rounds down and 0.125 (stored exactly) rounds to 0.12.
 */
export function roundTo(value: number, decimals: number = 2): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const error = productError(value, factor, scaled);
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;

  let roundUp = fraction > 0.5;
  if (fraction === 0.5) {
    roundUp = error > 0 || (error === 0 && floor % 2 !== 0);
  }
  return (roundUp ? floor + 1 : floor) / factor;
}

/**
 * numerator / denominator (denominator > 0) to the nearest integer,
 * exact halves to even
 */
function roundRatio(numerator: number, denominator: number): number {
  const quotient = Math.floor(numerator / denominator);
  const twiceRemainder = 2 * (numerator - quotient * denominator);
  if (twiceRemainder > denominator) return quotient + 1;
  if (twiceRemainder < denominator) return quotient;
  return quotient % 2 === 0 ? quotient : quotient + 1;
}

/**
 * 100 × part / total rounded to 2 decimals; 0 when total is 0
 */
export function percentageOf(part: number, total: number): number {
  if (total <= 0) return 0;
  return roundTo((part / total) * 100, 2);
}

/**
 * Fit y = a + b·x by ordinary least squares over x = 0..n-1 and
 * evaluate at x = n, rounded to the nearest integer (halves to even).
 *
 * The fitted value is kept as one fraction of integer sums,
 * (Σy·D + N·(n² − Σx)) / (n·D) with slope N / D, so ties are exact.
 *
 * n = 0 → 0. n = 1 → the single value (slope is 0).
 */
export function projectNextValue(series: readonly number[]): number {
  const n = series.length;
  if (n === 0) return 0;

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumXX = 0;
  series.forEach((y, x) => {
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumXX += x * x;
  });

  const slopeDenominator = n * sumXX - sumX * sumX;
  const slopeNumerator = slopeDenominator === 0 ? 0 : n * sumXY - sumX * sumY;
  const denominator = slopeDenominator === 0 ? 1 : slopeDenominator;

  return roundRatio(
    sumY * denominator + slopeNumerator * (n * n - sumX),
    n * denominator
  );
}

function compareMonthKeys(a: MonthlyCount, b: MonthlyCount): number {
  if (a.month < b.month) return -1;
  if (a.month > b.month) return 1;
  return 0;
}

/**
 * Sums counts per key into a record of own properties, so keys such as
 * "constructor" or "__proto__" stay plain data
 */
function toRecord(entries: Iterable<readonly [string, number]>): Record<string, number> {
  const totals = new Map<string, number>();
  for (const [key, count] of entries) {
    totals.set(key, (totals.get(key) ?? 0) + count);
  }
  return Object.fromEntries(totals);
}

function bucketEntries(buckets: readonly BucketCount[]): Array<[string, number]> {
  return buckets.map(({ key, count }) => [key, count]);
}

// =============================================================================
// EMPLOYEE GROWTH
// =============================================================================

/**
 * Monthly registrations, their mean, and a one-month-ahead projection.
 * Months are put in chronological order before the regression.
 */
export function summarizeEmployeeGrowth(rows: readonly MonthlyCount[]): EmployeeGrowthSummary {
  const ordered = [...rows].sort(compareMonthKeys);

  const monthly = toRecord(ordered.map(({ month, count }): [string, number] => [month, count]));

  const series = Object.values(monthly);
  const total = series.reduce((acc, value) => acc + value, 0);

  return {
    monthly_registrations: monthly,
    average_growth: series.length > 0 ? total / series.length : 0,
    projection: projectNextValue(series)
  };
}

// =============================================================================
// TRUCKER DISTRIBUTION
// =============================================================================

/**
 * Independence has priority over dominance.
 */
export function classifyTrend(percentages: Readonly<Record<string, number>>): DistributionTrend {
  const independentShare = percentages[INDEPENDENT_COMPANY] ?? 0;
  if (independentShare > TREND_THRESHOLDS.INDEPENDENCE_PERCENT) {
    return DistributionTrend.INCREASING_INDEPENDENCE;
  }

  if (Object.values(percentages).some(share => share > TREND_THRESHOLDS.DOMINANCE_PERCENT)) {
    return DistributionTrend.COMPANY_DOMINANCE;
  }

  return DistributionTrend.BALANCED;
}

/**
 * Bucket with the highest count; the first one wins a tie
 */
export function findMostCommon(buckets: readonly BucketCount[]): string | null {
  let best: BucketCount | null = null;
  for (const bucket of buckets) {
    if (best === null || bucket.count > best.count) {
      best = bucket;
    }
  }
  return best ? best.key : null;
}

export function summarizeTruckerDistribution(
  byProvince: readonly BucketCount[],
  byCompany: readonly BucketCount[],
  totalTruckers: number
): TruckerDistributionSummary {
  const companies = toRecord(bucketEntries(byCompany));

  const percentages = toRecord(
    totalTruckers > 0
      ? Object.entries(companies).map(([company, count]): [string, number] => [company, percentageOf(count, totalTruckers)])
      : []
  );

  return {
    by_province: toRecord(bucketEntries(byProvince)),
    by_company: companies,
    percentages,
    most_common: totalTruckers > 0 ? findMostCommon(byCompany) : null,
    trend: classifyTrend(percentages)
  };
}

// =============================================================================
// BUSINESS IMPACT & COMPLIANCE
// =============================================================================

export function churnRate(population: PopulationCounts): number {
  return percentageOf(population.archived, population.total);
}

export function complianceRate(documents: DocumentCounts): number {
  return percentageOf(documents.verified, documents.total);
}

export function summarizeBusinessImpact(
  employees: PopulationCounts,
  truckers: PopulationCounts,
  documents: DocumentCounts
): BusinessImpactSummary {
  return {
    employee_churn_rate: churnRate(employees),
    trucker_churn_rate: churnRate(truckers),
    document_compliance_rate: complianceRate(documents)
  };
}

export function buildComplianceSnapshot(
  employees: PopulationCounts,
  truckers: PopulationCounts,
  documents: DocumentCounts
): ComplianceSnapshot {
  return {
    total_employees: employees.total,
    active_employees: employees.total - employees.archived,
    total_truckers: truckers.total,
    active_truckers: truckers.total - truckers.archived,
    total_documents: documents.total,
    verified_documents: documents.verified,
    unverified_documents: Math.max(0, documents.total - documents.verified)
  };
}
