/**
 * =============================================================================
 * ANALYTICS MODULE - REPOSITORY
 * =============================================================================
 *
 * Grouped counting queries. Every method runs on the client it was built
 * with, so a service that builds one repository per transaction gets a
 * consistent snapshot across all of them.
 * =============================================================================
 */

import { Queryable } from '../../shared/database/db';
import { INDEPENDENT_COMPANY, MONTH_KEY_FORMAT } from '../../core';
import { BucketCount, DocumentCounts, MonthlyCount, PopulationCounts } from './analytics.types';

export interface AnalyticsRepository {
  /** Months are taken in UTC, whatever the session time zone */
  countActiveEmployeesByMonth(): Promise<MonthlyCount[]>;
  countTruckersByProvince(): Promise<BucketCount[]>;
  /** company_name NULL is reported under "Independent" */
  countTruckersByCompany(): Promise<BucketCount[]>;
  countEmployees(): Promise<PopulationCounts>;
  countTruckers(): Promise<PopulationCounts>;
  countDocuments(): Promise<DocumentCounts>;
}

export class PgAnalyticsRepository implements AnalyticsRepository {
  constructor(private readonly client: Queryable) {}

  async countActiveEmployeesByMonth(): Promise<MonthlyCount[]> {
    const { rows } = await this.client.query<MonthlyCount>(
      `SELECT to_char(registration_date AT TIME ZONE 'UTC', $1::text) AS month, count(*)::int AS count
         FROM employees
        WHERE NOT is_archived
        GROUP BY 1
        ORDER BY 1`,
      [MONTH_KEY_FORMAT]
    );
    return rows;
  }

  async countTruckersByProvince(): Promise<BucketCount[]> {
    const { rows } = await this.client.query<BucketCount>(
      `SELECT province_of_issue AS key, count(*)::int AS count
         FROM truckers
        GROUP BY province_of_issue
        ORDER BY province_of_issue`
    );
    return rows;
  }

  async countTruckersByCompany(): Promise<BucketCount[]> {
    const { rows } = await this.client.query<BucketCount>(
      `SELECT COALESCE(company_name, $1::text) AS key, count(*)::int AS count
         FROM truckers
        GROUP BY 1
        ORDER BY 1`,
      [INDEPENDENT_COMPANY]
    );
    return rows;
  }

  async countEmployees(): Promise<PopulationCounts> {
    const { rows } = await this.client.query<PopulationCounts>(
      `SELECT count(*)::int AS total,
              count(*) FILTER (WHERE is_archived)::int AS archived
         FROM employees`
    );
    return rows[0] ?? { total: 0, archived: 0 };
  }

  async countTruckers(): Promise<PopulationCounts> {
    const { rows } = await this.client.query<PopulationCounts>(
      `SELECT count(*)::int AS total,
              count(*) FILTER (WHERE is_archived)::int AS archived
         FROM truckers`
    );
    return rows[0] ?? { total: 0, archived: 0 };
  }

  async countDocuments(): Promise<DocumentCounts> {
    const { rows } = await this.client.query<DocumentCounts>(
      `SELECT count(*)::int AS total,
              count(*) FILTER (WHERE verified)::int AS verified
         FROM documents`
    );
    return rows[0] ?? { total: 0, verified: 0 };
  }
}
