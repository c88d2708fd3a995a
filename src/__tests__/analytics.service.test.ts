/**
 * =============================================================================
 * ANALYTICS SERVICE - Unit Tests
 * =============================================================================
 *
 * The service runs against an in-memory repository through a fake unit of
 * work, so no PostgreSQL is needed.
 * =============================================================================
 */

import { AnalyticsService } from '../modules/analytics/analytics.service';
import { AnalyticsRepository } from '../modules/analytics/analytics.repository';
import { TransactionOptions, UnitOfWork } from '../shared/database/db';

// =============================================================================
// MOCK SETUP
// =============================================================================

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

function createRepository(): jest.Mocked<AnalyticsRepository> {
  return {
    countActiveEmployeesByMonth: jest.fn().mockResolvedValue([]),
    countTruckersByProvince: jest.fn().mockResolvedValue([]),
    countTruckersByCompany: jest.fn().mockResolvedValue([]),
    countEmployees: jest.fn().mockResolvedValue({ total: 0, archived: 0 }),
    countTruckers: jest.fn().mockResolvedValue({ total: 0, archived: 0 }),
    countDocuments: jest.fn().mockResolvedValue({ total: 0, verified: 0 }),
  };
}

describe('AnalyticsService', () => {
  let repository: jest.Mocked<AnalyticsRepository>;
  let transactions: Array<TransactionOptions | undefined>;
  let service: AnalyticsService;

  beforeEach(() => {
    repository = createRepository();
    transactions = [];
    const unitOfWork: UnitOfWork<AnalyticsRepository> = (work, options) => {
      transactions.push(options);
      return work(repository);
    };
    service = new AnalyticsService(unitOfWork);
  });

  it('reads every report in one read-only snapshot transaction', async () => {
    await service.getEmployeeGrowth();
    await service.getTruckerDistribution();
    await service.getBusinessImpact();
    await service.getComplianceSnapshot();

    expect(transactions).toHaveLength(4);
    for (const options of transactions) {
      expect(options).toEqual({ isolationLevel: 'REPEATABLE READ', readOnly: true });
    }
  });

  it('summarizes employee growth from monthly rows', async () => {
    repository.countActiveEmployeesByMonth.mockResolvedValue([
      { month: '2024-02', count: 20 },
      { month: '2024-01', count: 10 },
    ]);

    await expect(service.getEmployeeGrowth()).resolves.toEqual({
      monthly_registrations: { '2024-01': 10, '2024-02': 20 },
      average_growth: 15,
      projection: 30,
    });
  });

  it('summarizes trucker distribution against the trucker total', async () => {
    repository.countTruckersByProvince.mockResolvedValue([
      { key: 'BC', count: 7 },
      { key: 'ON', count: 3 },
    ]);
    repository.countTruckersByCompany.mockResolvedValue([
      { key: 'Acme', count: 7 },
      { key: 'Independent', count: 3 },
    ]);
    repository.countTruckers.mockResolvedValue({ total: 10, archived: 1 });

    await expect(service.getTruckerDistribution()).resolves.toEqual({
      by_province: { BC: 7, ON: 3 },
      by_company: { Acme: 7, Independent: 3 },
      percentages: { Acme: 70, Independent: 30 },
      most_common: 'Acme',
      trend: 'Company dominance',
    });
  });

  it('returns zero rates on an empty database', async () => {
    await expect(service.getBusinessImpact()).resolves.toEqual({
      employee_churn_rate: 0,
      trucker_churn_rate: 0,
      document_compliance_rate: 0,
    });
  });

  it('builds the compliance snapshot from the three counts', async () => {
    repository.countEmployees.mockResolvedValue({ total: 12, archived: 2 });
    repository.countTruckers.mockResolvedValue({ total: 4, archived: 1 });
    repository.countDocuments.mockResolvedValue({ total: 9, verified: 6 });

    await expect(service.getComplianceSnapshot()).resolves.toEqual({
      total_employees: 12,
      active_employees: 10,
      total_truckers: 4,
      active_truckers: 3,
      total_documents: 9,
      verified_documents: 6,
      unverified_documents: 3,
    });
  });

  it('propagates storage failures', async () => {
    repository.countDocuments.mockRejectedValue(new Error('connection terminated'));

    await expect(service.getBusinessImpact()).rejects.toThrow('connection terminated');
  });
});
