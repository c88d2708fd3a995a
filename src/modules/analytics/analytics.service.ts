/**
 * =============================================================================
 * ANALYTICS MODULE - SERVICE
 * =============================================================================
 *
 * Four read-only reports. Each one reads all of its counts inside a single
 * REPEATABLE READ, READ ONLY transaction so the numbers agree with each
 * other even while writers are active.
 * =============================================================================
 */

import { createUnitOfWork, TransactionOptions, UnitOfWork } from '../../shared/database/db';
import { logger } from '../../shared/services/logger.service';
import { AnalyticsRepository, PgAnalyticsRepository } from './analytics.repository';
import {
  buildComplianceSnapshot,
  summarizeBusinessImpact,
  summarizeEmployeeGrowth,
  summarizeTruckerDistribution
} from './analytics.calculations';
import {
  BusinessImpactSummary,
  ComplianceSnapshot,
  EmployeeGrowthSummary,
  TruckerDistributionSummary
} from './analytics.types';

const SNAPSHOT: TransactionOptions = {
  isolationLevel: 'REPEATABLE READ',
  readOnly: true
};

export class AnalyticsService {
  constructor(private readonly unitOfWork: UnitOfWork<AnalyticsRepository>) {}

  async getEmployeeGrowth(): Promise<EmployeeGrowthSummary> {
    const rows = await this.unitOfWork(
      (repository) => repository.countActiveEmployeesByMonth(),
      SNAPSHOT
    );

    const summary = summarizeEmployeeGrowth(rows);
    logger.debug('[ANALYTICS] Employee growth computed', {
      months: rows.length,
      projection: summary.projection
    });
    return summary;
  }

  async getTruckerDistribution(): Promise<TruckerDistributionSummary> {
    const { byProvince, byCompany, truckers } = await this.unitOfWork(async (repository) => ({
      byProvince: await repository.countTruckersByProvince(),
      byCompany: await repository.countTruckersByCompany(),
      truckers: await repository.countTruckers()
    }), SNAPSHOT);

    return summarizeTruckerDistribution(byProvince, byCompany, truckers.total);
  }

  async getBusinessImpact(): Promise<BusinessImpactSummary> {
    const { employees, truckers, documents } = await this.unitOfWork(async (repository) => ({
      employees: await repository.countEmployees(),
      truckers: await repository.countTruckers(),
      documents: await repository.countDocuments()
    }), SNAPSHOT);

    return summarizeBusinessImpact(employees, truckers, documents);
  }

  async getComplianceSnapshot(): Promise<ComplianceSnapshot> {
    const { employees, truckers, documents } = await this.unitOfWork(async (repository) => ({
      employees: await repository.countEmployees(),
      truckers: await repository.countTruckers(),
      documents: await repository.countDocuments()
    }), SNAPSHOT);

    return buildComplianceSnapshot(employees, truckers, documents);
  }
}

export const analyticsService = new AnalyticsService(
  createUnitOfWork((client) => new PgAnalyticsRepository(client))
);
