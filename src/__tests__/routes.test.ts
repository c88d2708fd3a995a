/**
 * =============================================================================
 * HTTP ROUTES - Integration Tests
 * =============================================================================
 *
 * Drives the Express app with supertest. Services are mocked; the auth
 * middleware, validation and the error handler run for real.
 * =============================================================================
 */

import request from 'supertest';
import { Express } from 'express';
import { DatabaseError } from 'pg';
import { createApp } from '../app';
import { authService } from '../modules/auth/auth.service';
import { AuthenticationError, DocumentNotFoundError } from '../core';

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

const mockGetEmployeeGrowth = jest.fn();
const mockGetTruckerDistribution = jest.fn();
const mockGetBusinessImpact = jest.fn();
const mockGetComplianceSnapshot = jest.fn();
jest.mock('../modules/analytics/analytics.service', () => ({
  analyticsService: {
    getEmployeeGrowth: (...args: unknown[]) => mockGetEmployeeGrowth(...args),
    getTruckerDistribution: (...args: unknown[]) => mockGetTruckerDistribution(...args),
    getBusinessImpact: (...args: unknown[]) => mockGetBusinessImpact(...args),
    getComplianceSnapshot: (...args: unknown[]) => mockGetComplianceSnapshot(...args),
  },
}));

const mockSetVerification = jest.fn();
jest.mock('../modules/documents/documents.service', () => ({
  documentService: {
    setVerification: (...args: unknown[]) => mockSetVerification(...args),
  },
}));

const mockPingDatabase = jest.fn();
jest.mock('../shared/database/db', () => ({
  pingDatabase: (...args: unknown[]) => mockPingDatabase(...args),
  createUnitOfWork: () => () => Promise.reject(new Error('no database in route tests')),
}));

// =============================================================================
// TEST CONSTANTS
// =============================================================================

const COMPLIANCE = {
  total_employees: 3,
  active_employees: 2,
  total_truckers: 4,
  active_truckers: 4,
  total_documents: 5,
  verified_documents: 1,
  unverified_documents: 4,
};

describe('HTTP routes', () => {
  let app: Express;
  let token: string;

  beforeAll(() => {
    app = createApp();
    token = authService.issueToken({ username: 'alice' });
  });

  beforeEach(() => {
    jest.clearAllMocks();
    jest.restoreAllMocks();
  });

  // ===========================================================================
  // PUBLIC ROUTES
  // ===========================================================================

  describe('public routes', () => {
    it('GET / returns the service banner', async () => {
      const res = await request(app).get('/');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'IoT Analytics Backend Running!' });
    });

    it('GET /health/ready reports 200 when the database answers', async () => {
      mockPingDatabase.mockResolvedValue(true);

      const res = await request(app).get('/health/ready');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ready');
      expect(res.body.checks).toEqual({ database: true });
    });

    it('GET /health/ready reports 503 when the database is down', async () => {
      mockPingDatabase.mockResolvedValue(false);

      const res = await request(app).get('/health/ready');

      expect(res.status).toBe(503);
      expect(res.body.status).toBe('not_ready');
    });

    it('unknown routes get the 404 envelope', async () => {
      const res = await request(app).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'SYS_9005', message: 'Cannot GET /nope' },
      });
    });

    it('echoes a supplied request id', async () => {
      const res = await request(app).get('/health').set('X-Request-ID', 'req-123');

      expect(res.headers['x-request-id']).toBe('req-123');
    });
  });

  // ===========================================================================
  // ANALYTICS
  // ===========================================================================

  describe('analytics', () => {
    it('rejects a request without a token', async () => {
      const res = await request(app).get('/analytics/compliance');

      expect(res.status).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(res.body.error.code).toBe('AUTH_1004');
      expect(mockGetComplianceSnapshot).not.toHaveBeenCalled();
    });

    it('rejects an invalid token', async () => {
      const res = await request(app)
        .get('/analytics/compliance')
        .set('Authorization', 'Bearer not-a-jwt');

      expect(res.status).toBe(401);
      expect(res.body.error).toEqual({ code: 'AUTH_1003', message: 'Invalid token' });
    });

    it('rejects an expired token', async () => {
      const expired = authService.issueToken({ username: 'alice' }, -1);

      const res = await request(app)
        .get('/analytics/compliance')
        .set('Authorization', `Bearer ${expired}`);

      expect(res.status).toBe(401);
      expect(res.body.error).toEqual({ code: 'AUTH_1002', message: 'Token has expired' });
    });

    it('GET /analytics/compliance returns the unwrapped counts', async () => {
      mockGetComplianceSnapshot.mockResolvedValue(COMPLIANCE);

      const res = await request(app)
        .get('/analytics/compliance')
        .set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual(COMPLIANCE);
    });

    it('GET /analytics/employees/growth returns the summary', async () => {
      mockGetEmployeeGrowth.mockResolvedValue({
        monthly_registrations: { '2024-01': 1 },
        average_growth: 1,
        projection: 1,
      });

      const res = await request(app)
        .get('/analytics/employees/growth')
        .set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        monthly_registrations: { '2024-01': 1 },
        average_growth: 1,
        projection: 1,
      });
    });

    it('GET /analytics/truckers/distribution returns null most_common when empty', async () => {
      mockGetTruckerDistribution.mockResolvedValue({
        by_province: {},
        by_company: {},
        percentages: {},
        most_common: null,
        trend: 'Balanced',
      });

      const res = await request(app)
        .get('/analytics/truckers/distribution')
        .set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(200);
      expect(res.body.most_common).toBeNull();
      expect(res.body.trend).toBe('Balanced');
    });

    it('GET /analytics/business/impact hides storage errors behind a 500', async () => {
      mockGetBusinessImpact.mockRejectedValue(new Error('connection refused'));

      const res = await request(app)
        .get('/analytics/business/impact')
        .set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(500);
      expect(res.body.success).toBe(false);
      expect(res.body.error.code).toBe('SYS_9001');
    });
    it('maps PostgreSQL errors to a database error code', async () => {
      const dbError = new DatabaseError('relation "documents" does not exist', 0, 'error');
      dbError.code = '42P01';
      mockGetComplianceSnapshot.mockRejectedValue(dbError);

      const res = await request(app)
        .get('/analytics/compliance')
        .set('Authorization', `Bearer ${token}`);

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'SYS_9004', message: 'Database error' },
      });
    });
  });

  // ===========================================================================
  // DOCUMENTS
  // ===========================================================================

  describe('PUT /documents/:id', () => {
    it('updates verification and returns 204', async () => {
      mockSetVerification.mockResolvedValue({
        verified: true,
        verification_date: new Date('2024-03-01T09:00:00.000Z'),
        verified_by: 'alice',
      });

      const res = await request(app)
        .put('/documents/42')
        .set('Authorization', `Bearer ${token}`)
        .send({ verified: true, verified_by: 'alice' });

      expect(res.status).toBe(204);
      expect(res.text).toBe('');
      expect(mockSetVerification).toHaveBeenCalledWith(42, { verified: true, verifiedBy: 'alice' });
    });

    it('passes an omitted verifier as undefined', async () => {
      mockSetVerification.mockResolvedValue({ verified: false, verification_date: null, verified_by: null });

      const res = await request(app)
        .put('/documents/7')
        .set('Authorization', `Bearer ${token}`)
        .send({ verified: false });

      expect(res.status).toBe(204);
      expect(mockSetVerification).toHaveBeenCalledWith(7, { verified: false, verifiedBy: undefined });
    });

    it('returns 404 for a missing document', async () => {
      mockSetVerification.mockRejectedValue(new DocumentNotFoundError(999999));

      const res = await request(app)
        .put('/documents/999999')
        .set('Authorization', `Bearer ${token}`)
        .send({ verified: true, verified_by: 'alice' });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({
        success: false,
        error: {
          code: 'DOC_3001',
          message: 'Document not found',
          details: { documentId: 999999 },
        },
      });
    });

    it('rejects a non-numeric id', async () => {
      const res = await request(app)
        .put('/documents/abc')
        .set('Authorization', `Bearer ${token}`)
        .send({ verified: true });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VAL_2001');
      expect(mockSetVerification).not.toHaveBeenCalled();
    });

    it('rejects a body without a boolean verified flag', async () => {
      const res = await request(app)
        .put('/documents/1')
        .set('Authorization', `Bearer ${token}`)
        .send({ verified: 'yes' });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Invalid request data');
      expect(res.body.error.details.fields).toEqual([
        { field: 'verified', message: 'verified must be a boolean' },
      ]);
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app)
        .put('/documents/1')
        .set('Authorization', `Bearer ${token}`)
        .set('Content-Type', 'application/json')
        .send('{"verified": tru');

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({ code: 'VAL_2001', message: 'Malformed request body' });
    });

    it('rejects a body in an unsupported charset with 415', async () => {
      const res = await request(app)
        .put('/documents/1')
        .set('Authorization', `Bearer ${token}`)
        .set('Content-Type', 'application/json; charset=latin-9')
        .send('{"verified":true}');

      expect(res.status).toBe(415);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'VAL_2001', message: 'unsupported charset "LATIN-9"' },
      });
      expect(mockSetVerification).not.toHaveBeenCalled();
    });

    it.each(['0x10', '1e3', '+5', ' 12', '0', '2147483648'])('rejects the id %p', async (id) => {
      const res = await request(app)
        .put(`/documents/${encodeURIComponent(id)}`)
        .set('Authorization', `Bearer ${token}`)
        .send({ verified: true });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VAL_2001');
      expect(mockSetVerification).not.toHaveBeenCalled();
    });

    it('requires a token', async () => {
      const res = await request(app).put('/documents/1').send({ verified: true });

      expect(res.status).toBe(401);
      expect(mockSetVerification).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // AUTH
  // ===========================================================================

  describe('POST /auth/token', () => {
    it('accepts a form-encoded password grant', async () => {
      const login = jest.spyOn(authService, 'login').mockResolvedValue({
        access_token: 'issued-token',
        token_type: 'bearer',
      });

      const res = await request(app)
        .post('/auth/token')
        .type('form')
        .send({ grant_type: 'password', username: 'alice', password: 'test-password' });

      expect(res.status).toBe(200);
      expect(res.headers['cache-control']).toBe('no-store');
      expect(res.body).toEqual({ access_token: 'issued-token', token_type: 'bearer' });
      expect(login).toHaveBeenCalledWith('alice', 'test-password');
    });

    it('accepts a JSON body', async () => {
      jest.spyOn(authService, 'login').mockResolvedValue({
        access_token: 'issued-token',
        token_type: 'bearer',
      });

      const res = await request(app)
        .post('/auth/token')
        .send({ username: 'alice', password: 'test-password' });

      expect(res.status).toBe(200);
      expect(res.body.token_type).toBe('bearer');
    });

    it('returns 401 for bad credentials', async () => {
      jest.spyOn(authService, 'login').mockRejectedValue(new AuthenticationError());

      const res = await request(app)
        .post('/auth/token')
        .type('form')
        .send({ username: 'alice', password: 'wrong-password' });

      expect(res.status).toBe(401);
      expect(res.headers['www-authenticate']).toBe('Bearer');
      expect(res.body).toEqual({
        success: false,
        error: { code: 'AUTH_1001', message: 'Incorrect username or password' },
      });
    });

    it('rejects an oversized form body with 413', async () => {
      const login = jest.spyOn(authService, 'login');

      const res = await request(app)
        .post('/auth/token')
        .type('form')
        .send(`username=alice&password=${'x'.repeat(20000)}`);

      expect(res.status).toBe(413);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'VAL_2001', message: 'request entity too large' },
      });
      expect(login).not.toHaveBeenCalled();
    });

    it('returns 400 when the password is missing', async () => {
      const login = jest.spyOn(authService, 'login');

      const res = await request(app)
        .post('/auth/token')
        .type('form')
        .send({ username: 'alice' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VAL_2001');
      expect(login).not.toHaveBeenCalled();
    });

    it('rejects another grant type', async () => {
      const res = await request(app)
        .post('/auth/token')
        .type('form')
        .send({ grant_type: 'client_credentials', username: 'alice', password: 'test-password' });

      expect(res.status).toBe(400);
    });
  });
});
